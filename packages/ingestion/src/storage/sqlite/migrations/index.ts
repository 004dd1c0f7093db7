import type BetterSqlite3 from 'better-sqlite3';
import type { Logger } from '@hostpulse/shared';
import { up as initialSchema } from './001_initial.js';

interface Migration {
  version: number;
  name: string;
  up: (db: BetterSqlite3.Database) => void;
}

export const MIGRATIONS: readonly Migration[] = [
  { version: 1, name: '001_initial', up: initialSchema },
];

/** Highest applied migration version, 0 for a fresh database. */
export function getSchemaVersion(db: BetterSqlite3.Database): number {
  const row = db.prepare('SELECT MAX(version) AS version FROM _migrations').get() as
    | { version: number | null }
    | undefined;
  return row?.version ?? 0;
}

/**
 * Bring the schema up to date in a single transaction and return the names
 * of the migrations applied.
 */
export function runMigrations(db: BetterSqlite3.Database, logger?: Logger): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL DEFAULT (unixepoch())
    );
  `);

  const current = getSchemaVersion(db);
  const pending = MIGRATIONS.filter((migration) => migration.version > current);
  if (pending.length === 0) return [];

  const record = db.prepare('INSERT INTO _migrations (version, name) VALUES (?, ?)');
  db.transaction(() => {
    for (const migration of pending) {
      migration.up(db);
      record.run(migration.version, migration.name);
    }
  })();

  const applied = pending.map((migration) => migration.name);
  logger?.info({ from: current, to: getSchemaVersion(db), applied }, 'Storage schema migrated');
  return applied;
}
