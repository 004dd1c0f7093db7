import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import BetterSqlite3 from 'better-sqlite3';
import { StorageError } from '@hostpulse/shared';
import { openDatabase, IN_MEMORY } from '../storage/sqlite/Database.js';
import { getSchemaVersion, runMigrations } from '../storage/sqlite/migrations/index.js';
import { SqliteStorage } from '../storage/sqlite/SqliteStorage.js';
import { MINUTE, asLogger, at, createMockLogger, makeSnapshot } from './helpers.js';

describe('SqliteStorage', () => {
  let db: BetterSqlite3.Database;
  let storage: SqliteStorage;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    logger = createMockLogger();
    db = openDatabase(IN_MEMORY);
    storage = new SqliteStorage(db, asLogger(logger));
  });

  afterEach(async () => {
    await storage.close();
  });

  describe('migrations', () => {
    it('should create one table per metric group', () => {
      const rows = db
        .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
        .all() as Array<{ name: string }>;
      const names = rows.map((row) => row.name);

      expect(names).toEqual(
        expect.arrayContaining([
          '_migrations',
          'snapshots',
          'cpu_metrics',
          'memory_metrics',
          'swap_metrics',
          'disk_metrics',
          'disk_io_metrics',
          'network_metrics',
        ]),
      );
    });

    it('should record the migration version', () => {
      const migration = db.prepare('SELECT * FROM _migrations WHERE version = 1').get() as {
        version: number;
        name: string;
      };
      expect(migration.name).toBe('001_initial');
    });

    it('should not reapply migrations', () => {
      expect(runMigrations(db)).toEqual([]);
      expect(getSchemaVersion(db)).toBe(1);
    });

    it('should migrate a fresh database and log the applied steps', () => {
      const fresh = new BetterSqlite3(IN_MEMORY);
      try {
        expect(runMigrations(fresh, asLogger(logger))).toEqual(['001_initial']);
        expect(logger.info).toHaveBeenCalledWith(
          { from: 0, to: 1, applied: ['001_initial'] },
          'Storage schema migrated',
        );
      } finally {
        fresh.close();
      }
    });
  });

  describe('write/query', () => {
    it('should return a written snapshot unchanged', async () => {
      const snapshot = makeSnapshot();
      await storage.write(snapshot);

      const results = await storage.query();
      expect(results).toEqual([snapshot]);
    });

    it('should omit optional groups that were never written', async () => {
      await storage.write(makeSnapshot({ swap: null, io: false }));

      const [result] = await storage.query();
      expect('swap' in result).toBe(false);
      expect('io' in result.disk).toBe(false);
    });

    it('should keep one row per metric group', async () => {
      await storage.write(makeSnapshot({ disks: [{ mount: '/', percent: 50 }, { mount: '/data', percent: 70 }] }));

      const count = (table: string) =>
        (db.prepare(`SELECT COUNT(*) AS n FROM ${table}`).get() as { n: number }).n;

      expect(count('snapshots')).toBe(1);
      expect(count('cpu_metrics')).toBe(1);
      expect(count('memory_metrics')).toBe(1);
      expect(count('swap_metrics')).toBe(1);
      expect(count('disk_metrics')).toBe(2);
      expect(count('disk_io_metrics')).toBe(1);
      expect(count('network_metrics')).toBe(1);
    });

    it('should order filesystems by mount point', async () => {
      await storage.write(
        makeSnapshot({
          disks: [
            { mount: '/var', percent: 10 },
            { mount: '/', percent: 20 },
            { mount: '/data', percent: 30 },
          ],
        }),
      );

      const [result] = await storage.query();
      expect(result.disk.filesystems.map((fs) => fs.mount_point)).toEqual(['/', '/data', '/var']);
    });

    it('should keep the first write of a duplicate snapshot', async () => {
      await storage.write(makeSnapshot({ cpu: 10 }));
      await storage.write(makeSnapshot({ cpu: 20 }));

      const results = await storage.query();
      expect(results).toHaveLength(1);
      expect(results[0].cpu.overall_percent).toBe(10);
      expect(logger.debug).toHaveBeenCalledWith(
        { hostname: 'h1', timestamp: '2024-05-01T12:00:00.000Z' },
        'Duplicate snapshot ignored',
      );
    });

    it('should return snapshots in ascending time order with hostname as tie-break', async () => {
      await storage.write(makeSnapshot({ hostname: 'h1', timestamp: at(2 * MINUTE) }));
      await storage.write(makeSnapshot({ hostname: 'h2', timestamp: at(0) }));
      await storage.write(makeSnapshot({ hostname: 'h1', timestamp: at(0) }));

      const results = await storage.query();
      expect(results.map((s) => [s.hostname, s.timestamp.getTime()])).toEqual([
        ['h1', at(0).getTime()],
        ['h2', at(0).getTime()],
        ['h1', at(2 * MINUTE).getTime()],
      ]);
    });
  });

  describe('query filters', () => {
    beforeEach(async () => {
      for (let i = 0; i < 5; i++) {
        await storage.write(makeSnapshot({ hostname: 'h1', timestamp: at(i * MINUTE) }));
      }
      await storage.write(makeSnapshot({ hostname: 'h2', timestamp: at(MINUTE) }));
    });

    it('should filter by host', async () => {
      const results = await storage.query({ host: 'h2' });
      expect(results).toHaveLength(1);
      expect(results[0].hostname).toBe('h2');
    });

    it('should treat since and until as inclusive', async () => {
      const results = await storage.query({ host: 'h1', since: at(MINUTE), until: at(3 * MINUTE) });
      expect(results.map((s) => s.timestamp)).toEqual([at(MINUTE), at(2 * MINUTE), at(3 * MINUTE)]);
    });

    it('should return the latest records in ascending order when limited', async () => {
      const results = await storage.query({ host: 'h1', limit: 2 });
      expect(results.map((s) => s.timestamp)).toEqual([at(3 * MINUTE), at(4 * MINUTE)]);
    });

    it('should return nothing for an unknown host', async () => {
      expect(await storage.query({ host: 'nope' })).toEqual([]);
    });
  });

  describe('lifecycle', () => {
    it('should ping while open', async () => {
      await expect(storage.ping()).resolves.toBeUndefined();
    });

    it('should fail ping and writes after close', async () => {
      await storage.close();

      await expect(storage.ping()).rejects.toThrow('[sqlite] Database is closed');
      await expect(storage.write(makeSnapshot())).rejects.toBeInstanceOf(StorageError);
      await expect(storage.write(makeSnapshot())).rejects.toThrow(
        '[sqlite] Failed to write snapshot for h1',
      );
    });

    it('should close more than once', async () => {
      await storage.close();
      await expect(storage.close()).resolves.toBeUndefined();
    });
  });
});
