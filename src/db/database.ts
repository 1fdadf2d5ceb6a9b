import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { config } from '../config.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('db');

let _db: Database.Database | null = null;

/** Process-wide database at config.db.path (`:memory:` in tests) */
export function getDb(): Database.Database {
  if (!_db) {
    _db = openDb(config.db.path);
    log.info({ path: config.db.path }, 'Database initialized');
  }
  return _db;
}

export function openDb(path: string): Database.Database {
  if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true });
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  initSchema(db);
  return db;
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS audit_log (
      id         INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp  INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000),
      level      TEXT NOT NULL,
      module     TEXT NOT NULL,
      action     TEXT NOT NULL,
      detail     TEXT,
      plan_id    TEXT,
      mode       TEXT
    );

    CREATE TABLE IF NOT EXISTS plan_history (
      id          TEXT PRIMARY KEY,
      kind        TEXT NOT NULL,
      symbol      TEXT NOT NULL,
      side        TEXT NOT NULL,
      status      TEXT NOT NULL,
      reason      TEXT,
      filled_qty  REAL NOT NULL,
      requested_qty REAL NOT NULL,
      created_at  INTEGER NOT NULL,
      ended_at    INTEGER,
      mode        TEXT NOT NULL,
      snapshot    TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_audit_ts ON audit_log(timestamp);
    CREATE INDEX IF NOT EXISTS idx_audit_plan ON audit_log(plan_id);
    CREATE INDEX IF NOT EXISTS idx_plan_history_ended ON plan_history(ended_at);
  `);
}
