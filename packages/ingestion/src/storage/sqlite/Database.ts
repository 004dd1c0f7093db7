import BetterSqlite3 from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Logger } from '@hostpulse/shared';
import { runMigrations } from './migrations/index.js';

export const IN_MEMORY = ':memory:';

/** How long a writer waits on a locked database before SQLITE_BUSY. */
const BUSY_TIMEOUT_MS = 5000;

/** Open (creating if needed) and migrate the metrics database. */
export function openDatabase(dbPath: string, logger?: Logger): BetterSqlite3.Database {
  const inMemory = dbPath === IN_MEMORY;
  if (!inMemory) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new BetterSqlite3(dbPath);

  // WAL has no effect on an in-memory database
  if (!inMemory) db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);

  runMigrations(db, logger);
  return db;
}
