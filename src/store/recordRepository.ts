// src/store/recordRepository.ts
// Store: persistence seam for merged records.
//
// The review queue and document pipeline read and write through this
// interface; the in-memory version serves single runs and tests, the SQLite
// version (sqliteRecordRepository.ts) keeps records across runs.

import type { MergedRecord, ReviewStatus } from '../merge/types';

export interface RecordFilter {
  documentId?: string;
  status?: ReviewStatus;
}

export interface RecordRepository {
  get(recordId: string): MergedRecord | undefined;
  /** Insert or replace by recordId */
  put(record: MergedRecord): void;
  putMany(records: readonly MergedRecord[]): void;
  /** Matching records in first-insertion order */
  list(filter?: RecordFilter): MergedRecord[];
}

export function matchesFilter(record: MergedRecord, filter: RecordFilter = {}): boolean {
  if (filter.documentId !== undefined && record.documentId !== filter.documentId) return false;
  if (filter.status !== undefined && record.reviewStatus !== filter.status) return false;
  return true;
}

export class InMemoryRecordRepository implements RecordRepository {
  private readonly records = new Map<string, MergedRecord>();

  get(recordId: string): MergedRecord | undefined {
    return this.records.get(recordId);
  }

  put(record: MergedRecord): void {
    this.records.set(record.recordId, record);
  }

  putMany(records: readonly MergedRecord[]): void {
    for (const r of records) this.put(r);
  }

  list(filter?: RecordFilter): MergedRecord[] {
    return [...this.records.values()].filter((r) => matchesFilter(r, filter));
  }
}
