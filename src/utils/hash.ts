// src/utils/hash.ts
// Deterministic hashing for canonical fallback ids and provenance fingerprints.
import crypto from "node:crypto";

export function sha256Hex(input: string | Buffer): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Stable stringify with sorted object keys (handles nested arrays/objects). */
export function stableStringify(value: unknown): string {
  if (value === null) return "null";
  const t = typeof value;
  if (t === "number" || t === "boolean" || t === "string") return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(",")}]`;
  if (isPlainRecord(value)) {
    const keys = Object.keys(value)
      .filter((k) => value[k] !== undefined)
      .sort();
    const parts = keys.map((k) => `${JSON.stringify(k)}:${stableStringify(value[k])}`);
    return `{${parts.join(",")}}`;
  }
  // undefined / functions / symbols serialize as null
  return "null";
}

/** Stable SHA-256 of any JSON-serializable value. */
export function stableHash(value: unknown): string {
  return sha256Hex(Buffer.from(stableStringify(value), "utf8"));
}
