import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';

export type SqliteDatabase = Database.Database;

const MEMORY = ':memory:';

/**
 * Accepts a bare path, `:memory:`, or the `sqlite:` / `sqlite://` URL forms.
 */
export function sqlitePathFromUrl(url: string): string {
  const path = url.replace(/^sqlite:(\/\/)?/, '');
  return path === '' ? MEMORY : path;
}

/**
 * Open (creating if needed) the SQLite database behind DATABASE_URL.
 */
export function openSqlite(url: string): SqliteDatabase {
  const path = sqlitePathFromUrl(url);
  if (path !== MEMORY) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  // Wait for a competing writer instead of failing with SQLITE_BUSY
  db.pragma('busy_timeout = 5000');
  db.pragma('foreign_keys = ON');
  return db;
}

/**
 * Timestamps are stored as ISO-8601 UTC text. Rows written with
 * CURRENT_TIMESTAMP ("YYYY-MM-DD HH:MM:SS", UTC) are read as well.
 */
export function parseSqliteTimestamp(value: string): Date {
  if (/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}(\.\d+)?$/.test(value)) {
    return new Date(`${value.replace(' ', 'T')}Z`);
  }
  return new Date(value);
}

export function toSqliteTimestamp(date: Date): string {
  return date.toISOString();
}
