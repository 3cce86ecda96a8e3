// src/store/sqliteRecordRepository.ts
// Store: SQLite-backed record repository.
//
// Table: merged_records (see db.ts). The full record is kept as JSON; the
// indexed columns mirror the fields the review queue filters on.

import type Database from 'better-sqlite3';
import type { SqliteDatabase } from '../db';
import type { MergedRecord } from '../merge/types';
import { createLogger } from '../observability';
import { decodeRecord, encodeRecord } from './recordCodec';
import type { RecordFilter, RecordRepository } from './recordRepository';

const log = createLogger('store/records');

/* ---------- Row Types ---------- */

interface RecordRow {
  record_id: string;
  record_json: string;
}

interface UpsertParams {
  record_id: string;
  document_id: string;
  kind: string;
  status: string;
  confidence: number;
  record_json: string;
  updated_at: number;
}

function rowToRecord(row: RecordRow): MergedRecord | undefined {
  const record = decodeRecord(row.record_json);
  if (!record) log.warn({ recordId: row.record_id }, 'Skipping unreadable stored record');
  return record;
}

/* ---------- Repository ---------- */

export class SqliteRecordRepository implements RecordRepository {
  private readonly upsert: Database.Statement<[UpsertParams], void>;
  private readonly selectOne: Database.Statement<[string], RecordRow>;

  constructor(private readonly db: SqliteDatabase, private readonly now: () => number = Date.now) {
    this.upsert = db.prepare<[UpsertParams], void>(`
      INSERT INTO merged_records(record_id, document_id, kind, status, confidence, record_json, seq, updated_at)
      VALUES (@record_id, @document_id, @kind, @status, @confidence, @record_json,
              (SELECT COALESCE(MAX(seq), 0) + 1 FROM merged_records), @updated_at)
      ON CONFLICT(record_id) DO UPDATE SET
        document_id = excluded.document_id,
        kind = excluded.kind,
        status = excluded.status,
        confidence = excluded.confidence,
        record_json = excluded.record_json,
        updated_at = excluded.updated_at
    `);
    this.selectOne = db.prepare<[string], RecordRow>(
      'SELECT record_id, record_json FROM merged_records WHERE record_id = ?'
    );
  }

  get(recordId: string): MergedRecord | undefined {
    const row = this.selectOne.get(recordId);
    return row ? rowToRecord(row) : undefined;
  }

  put(record: MergedRecord): void {
    this.upsert.run({
      record_id: record.recordId,
      document_id: record.documentId,
      kind: record.kind,
      status: record.reviewStatus,
      confidence: record.confidence,
      record_json: encodeRecord(record),
      updated_at: this.now(),
    });
  }

  putMany(records: readonly MergedRecord[]): void {
    const tx = this.db.transaction((batch: readonly MergedRecord[]) => {
      for (const r of batch) this.put(r);
    });
    tx(records);
  }

  list(filter: RecordFilter = {}): MergedRecord[] {
    const clauses: string[] = [];
    const params: string[] = [];
    if (filter.documentId !== undefined) {
      clauses.push('document_id = ?');
      params.push(filter.documentId);
    }
    if (filter.status !== undefined) {
      clauses.push('status = ?');
      params.push(filter.status);
    }
    const where = clauses.length ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = this.db
      .prepare<string[], RecordRow>(`SELECT record_id, record_json FROM merged_records ${where} ORDER BY seq ASC`)
      .all(...params);

    const out: MergedRecord[] = [];
    for (const row of rows) {
      const record = rowToRecord(row);
      if (record) out.push(record);
    }
    return out;
  }
}
