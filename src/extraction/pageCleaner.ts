// src/extraction/pageCleaner.ts
// Extraction: page furniture removal and document title detection.

/* ---------- Constants ---------- */

const FOOTER_MIN_PAGE_LINES = 10; // short pages keep every line
const FOOTER_MAX_LINES = 3;       // page numbers, running footers
const FOOTER_MAX_CHARS = 10;

/**
 * Drop trailing page furniture (page numbers, short running footers).
 * Only applies to pages with at least FOOTER_MIN_PAGE_LINES lines, and only
 * removes from the end, so offsets into the kept text are unchanged.
 */
export function stripPageFurniture(text: string): string {
  const lines = text.split('\n');
  if (lines.length < FOOTER_MIN_PAGE_LINES) return text;

  while (lines.length > 0 && lines[lines.length - 1].trim() === '') lines.pop();

  let removed = 0;
  while (removed < FOOTER_MAX_LINES && lines.length > 0) {
    const last = lines[lines.length - 1].trim();
    if (last === '' || /^\d+$/.test(last) || last.length < FOOTER_MAX_CHARS) {
      lines.pop();
      removed++;
    } else {
      break;
    }
  }
  return lines.join('\n');
}

/** First non-blank line of the text, whitespace-collapsed */
export function firstLine(text: string): string | undefined {
  for (const line of text.split('\n')) {
    const t = line.replace(/\s+/g, ' ').trim();
    if (t) return t;
  }
  return undefined;
}

/** Offset just past the first non-blank line, or 0 for a blank text */
export function firstLineEnd(text: string): number {
  let offset = 0;
  for (const line of text.split('\n')) {
    if (line.trim()) return offset + line.length;
    offset += line.length + 1;
  }
  return 0;
}

/** Case- and whitespace-insensitive comparison form */
export function comparisonForm(text: string): string {
  return text.replace(/\s+/g, ' ').trim().toLowerCase();
}
