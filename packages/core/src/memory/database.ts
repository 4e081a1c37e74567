// packages/core/src/memory/database.ts

import Database from 'better-sqlite3';
import { DatabaseError } from '../utils/errors.js';

const SCHEMA_VERSION = '1';

const MIGRATIONS = [
  // Conversation sessions
  `CREATE TABLE IF NOT EXISTS sessions (
    id            TEXT PRIMARY KEY,
    preferences   JSON,
    persona       JSON,
    created_at    DATETIME DEFAULT CURRENT_TIMESTAMP,
    updated_at    DATETIME DEFAULT CURRENT_TIMESTAMP
  )`,

  // Conversation turns
  `CREATE TABLE IF NOT EXISTS turns (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id    TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
    role          TEXT NOT NULL,
    content       TEXT NOT NULL,
    created_at    TEXT NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_turns_session ON turns(session_id, id)',

  // One row per processed message
  `CREATE TABLE IF NOT EXISTS runs (
    id                  TEXT PRIMARY KEY,
    session_id          TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
    category            TEXT,
    success             INTEGER NOT NULL,
    degraded            INTEGER NOT NULL DEFAULT 0,
    quality_score       REAL,
    regeneration_count  INTEGER NOT NULL DEFAULT 0,
    demo_fallback       INTEGER NOT NULL DEFAULT 0,
    duration_ms         INTEGER NOT NULL,
    created_at          DATETIME DEFAULT CURRENT_TIMESTAMP
  )`,
  'CREATE INDEX IF NOT EXISTS idx_runs_session ON runs(session_id)',

  // Schema meta
  `CREATE TABLE IF NOT EXISTS schema_meta (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,
];

/**
 * Open a SQLite database and run migrations.
 * ':memory:' keeps everything in process, which is the default.
 */
export function openDatabase(dbPath: string): Database.Database {
  try {
    const db = new Database(dbPath);
    configurePragmas(db, dbPath);
    runMigrations(db);
    return db;
  } catch (err) {
    throw new DatabaseError(
      `Failed to open database at "${dbPath}": ${err instanceof Error ? err.message : String(err)}`,
      'open',
    );
  }
}

function configurePragmas(db: Database.Database, dbPath: string): void {
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
}

/**
 * Run all schema migrations. Idempotent (uses IF NOT EXISTS).
 */
export function runMigrations(db: Database.Database): void {
  db.transaction(() => {
    for (const sql of MIGRATIONS) {
      db.exec(sql);
    }
    db.prepare("INSERT OR REPLACE INTO schema_meta(key, value) VALUES ('version', ?)").run(
      SCHEMA_VERSION,
    );
    db.prepare(
      "INSERT OR IGNORE INTO schema_meta(key, value) VALUES ('created_at', datetime('now'))",
    ).run();
  })();
}

/** Get the current schema version. */
export function getSchemaVersion(db: Database.Database): string | null {
  const row = db.prepare("SELECT value FROM schema_meta WHERE key = 'version'").get() as
    | { value: string }
    | undefined;
  return row?.value ?? null;
}
