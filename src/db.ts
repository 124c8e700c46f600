import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import BetterSqlite3 from "better-sqlite3";

export type Database = BetterSqlite3.Database;

const PRAGMAS = [
  "busy_timeout = 5000",
  "auto_vacuum = INCREMENTAL",
  "journal_mode = WAL",
  "synchronous = NORMAL",
  "foreign_keys = ON",
];

export function getDb(dbPath: string): Database {
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new BetterSqlite3(dbPath);
  for (const pragma of PRAGMAS) {
    try {
      db.pragma(pragma);
    } catch {
      // another process holding the lock may refuse journal_mode; keep going
    }
  }

  db.exec(`
  CREATE TABLE IF NOT EXISTS meta (
    key TEXT PRIMARY KEY NOT NULL,
    value TEXT
  );
`);

  db.exec(`
  CREATE TABLE IF NOT EXISTS items (
    id                   TEXT PRIMARY KEY NOT NULL,
    name                 TEXT NOT NULL,
    status               TEXT NOT NULL,       -- PENDING | AVAILABLE | PARTIAL | MISSING | REMOVED
    descriptor_path      TEXT,
    descriptor_kind      TEXT,                -- 'zurginfo' | 'zurgtorrent'
    descriptor_present   INTEGER NOT NULL DEFAULT 1,
    source_metadata_hash TEXT,
    gateway_status       TEXT,
    total_size           INTEGER NOT NULL DEFAULT 0,
    missing_streak       INTEGER NOT NULL DEFAULT 0,
    visible_files        INTEGER NOT NULL DEFAULT 0,
    matched_files        INTEGER NOT NULL DEFAULT 0,
    mount_path           TEXT,
    needs_inspection     INTEGER NOT NULL DEFAULT 0,
    last_error           TEXT,
    created_at           INTEGER NOT NULL,
    last_seen_at         INTEGER NOT NULL,
    last_checked_at      INTEGER,
    status_changed_at    INTEGER NOT NULL,
    removed_at           INTEGER
  );
  CREATE INDEX IF NOT EXISTS items_status_idx ON items(status);
  CREATE INDEX IF NOT EXISTS items_descriptor_idx ON items(descriptor_path);

  CREATE TABLE IF NOT EXISTS item_files (
    item_id TEXT NOT NULL REFERENCES items(id) ON DELETE CASCADE,
    idx     INTEGER NOT NULL,
    path    TEXT NOT NULL,
    size    INTEGER NOT NULL,
    PRIMARY KEY (item_id, idx)
  ) WITHOUT ROWID;
`);

  db.exec(`
  CREATE TABLE IF NOT EXISTS passes (
    id                INTEGER PRIMARY KEY AUTOINCREMENT,
    started_at        INTEGER NOT NULL,
    finished_at       INTEGER NOT NULL,
    reason            TEXT,
    mount_state       TEXT NOT NULL,      -- 'healthy' | 'unknown'
    mount_reason      TEXT,
    paused            INTEGER NOT NULL DEFAULT 0,
    descriptors       INTEGER NOT NULL DEFAULT 0,
    warnings          INTEGER NOT NULL DEFAULT 0,
    evaluated         INTEGER NOT NULL DEFAULT 0,
    transitions       INTEGER NOT NULL DEFAULT 0,
    write_errors      INTEGER NOT NULL DEFAULT 0,
    skipped           INTEGER NOT NULL DEFAULT 0,
    interrupted       INTEGER NOT NULL DEFAULT 0
  );
  CREATE INDEX IF NOT EXISTS passes_started_idx ON passes(started_at);
`);

  return db;
}
