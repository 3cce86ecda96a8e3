// src/db.ts
// Database initialization for the record store.
//
// better-sqlite3 opens synchronously and the schema is created on open
// (idempotent). ':memory:' skips directory creation.

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { config } from './config';
import { createLogger } from './observability';

const log = createLogger('db');

export type SqliteDatabase = Database.Database;

function initSchema(rawDb: SqliteDatabase): void {
  rawDb.exec(`
CREATE TABLE IF NOT EXISTS merged_records(
  record_id TEXT PRIMARY KEY,
  document_id TEXT NOT NULL,
  kind TEXT NOT NULL,              -- citation | definition
  status TEXT NOT NULL,            -- review status
  confidence REAL NOT NULL,
  record_json TEXT NOT NULL,       -- full MergedRecord
  seq INTEGER NOT NULL,            -- first-insertion order
  updated_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_records_doc ON merged_records(document_id, seq);
CREATE INDEX IF NOT EXISTS idx_records_status ON merged_records(status);
`);
}

/** Open (and create if needed) the record database */
export function openDatabase(dbPath: string = config.database.path): SqliteDatabase {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const rawDb = new Database(dbPath);
  rawDb.pragma('journal_mode = WAL');
  initSchema(rawDb);
  log.debug({ path: dbPath }, 'Record database ready');
  return rawDb;
}
