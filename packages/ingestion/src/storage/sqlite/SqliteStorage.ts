import type BetterSqlite3 from 'better-sqlite3';
import { StorageError, getLogger } from '@hostpulse/shared';
import type { FilesystemUsage, Logger, MetricSnapshot, QueryFilter } from '@hostpulse/shared';
import { resolveQuery } from '../StorageAdapter.js';
import type { StorageAdapter } from '../StorageAdapter.js';
import { openDatabase } from './Database.js';

interface SnapshotRow {
  id: number;
  hostname: string;
  timestamp: number;
  collection_duration_ms: number | null;
  overall_percent: number;
  per_core_percent: string;
  load_avg_1: number;
  load_avg_5: number;
  load_avg_15: number;
  core_count_physical: number | null;
  core_count_logical: number | null;
  mem_total: number;
  mem_used: number;
  mem_free: number;
  mem_available: number;
  mem_percent: number;
  swap_total: number | null;
  swap_used: number | null;
  swap_free: number | null;
  swap_percent: number | null;
  io_read_count: number | null;
  io_write_count: number | null;
  io_read_bytes: number | null;
  io_write_bytes: number | null;
  bytes_sent: number;
  bytes_recv: number;
  errors_in: number;
  errors_out: number;
  drops_in: number | null;
  drops_out: number | null;
}

interface DiskRow {
  mount_point: string;
  device: string | null;
  fs_type: string | null;
  total_bytes: number;
  used_bytes: number;
  free_bytes: number;
  percent_used: number;
}

const SELECT_SNAPSHOTS = `
  SELECT * FROM (
    SELECT
      s.id, s.hostname, s.timestamp, s.collection_duration_ms,
      c.overall_percent, c.per_core_percent, c.load_avg_1, c.load_avg_5, c.load_avg_15,
      c.core_count_physical, c.core_count_logical,
      m.total_bytes AS mem_total, m.used_bytes AS mem_used, m.free_bytes AS mem_free,
      m.available_bytes AS mem_available, m.percent_used AS mem_percent,
      sw.total_bytes AS swap_total, sw.used_bytes AS swap_used, sw.free_bytes AS swap_free,
      sw.percent_used AS swap_percent,
      io.read_count AS io_read_count, io.write_count AS io_write_count,
      io.read_bytes AS io_read_bytes, io.write_bytes AS io_write_bytes,
      n.bytes_sent, n.bytes_recv, n.errors_in, n.errors_out, n.drops_in, n.drops_out
    FROM snapshots s
    JOIN cpu_metrics c ON c.snapshot_id = s.id
    JOIN memory_metrics m ON m.snapshot_id = s.id
    JOIN network_metrics n ON n.snapshot_id = s.id
    LEFT JOIN swap_metrics sw ON sw.snapshot_id = s.id
    LEFT JOIN disk_io_metrics io ON io.snapshot_id = s.id
    WHERE (@host IS NULL OR s.hostname = @host)
      AND (@since IS NULL OR s.timestamp >= @since)
      AND (@until IS NULL OR s.timestamp <= @until)
    ORDER BY s.timestamp DESC, s.hostname DESC
    LIMIT @limit
  )
  ORDER BY timestamp ASC, hostname ASC
`;

/**
 * Relational backend: one row per metric group, keyed by the snapshot id.
 * Duplicate `(hostname, timestamp)` writes are ignored, so the first write wins.
 */
export class SqliteStorage implements StorageAdapter {
  readonly backend = 'sqlite' as const;
  private db: BetterSqlite3.Database;
  private logger: Logger;
  private insertSnapshotStmt: BetterSqlite3.Statement;
  private insertCpuStmt: BetterSqlite3.Statement;
  private insertMemoryStmt: BetterSqlite3.Statement;
  private insertSwapStmt: BetterSqlite3.Statement;
  private insertDiskStmt: BetterSqlite3.Statement;
  private insertDiskIoStmt: BetterSqlite3.Statement;
  private insertNetworkStmt: BetterSqlite3.Statement;
  private selectSnapshotsStmt: BetterSqlite3.Statement;
  private selectDisksStmt: BetterSqlite3.Statement;
  private insertAll: (snapshot: MetricSnapshot) => boolean;
  private closed: boolean = false;

  static open(dbPath: string, logger?: Logger): SqliteStorage {
    try {
      return new SqliteStorage(openDatabase(dbPath, logger), logger);
    } catch (err) {
      throw new StorageError('sqlite', `Cannot open database at ${dbPath}`, err);
    }
  }

  constructor(db: BetterSqlite3.Database, logger?: Logger) {
    this.db = db;
    this.logger = logger ?? getLogger().child({ component: 'storage', backend: 'sqlite' });

    this.insertSnapshotStmt = db.prepare(`
      INSERT OR IGNORE INTO snapshots (hostname, timestamp, collection_duration_ms)
      VALUES (?, ?, ?)
    `);
    this.insertCpuStmt = db.prepare(`
      INSERT INTO cpu_metrics (
        snapshot_id, overall_percent, per_core_percent, load_avg_1, load_avg_5, load_avg_15,
        core_count_physical, core_count_logical
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.insertMemoryStmt = db.prepare(`
      INSERT INTO memory_metrics (
        snapshot_id, total_bytes, used_bytes, free_bytes, available_bytes, percent_used
      ) VALUES (?, ?, ?, ?, ?, ?)
    `);
    this.insertSwapStmt = db.prepare(`
      INSERT INTO swap_metrics (snapshot_id, total_bytes, used_bytes, free_bytes, percent_used)
      VALUES (?, ?, ?, ?, ?)
    `);
    this.insertDiskStmt = db.prepare(`
      INSERT INTO disk_metrics (
        snapshot_id, mount_point, device, fs_type, total_bytes, used_bytes, free_bytes, percent_used
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.insertDiskIoStmt = db.prepare(`
      INSERT INTO disk_io_metrics (snapshot_id, read_count, write_count, read_bytes, write_bytes)
      VALUES (?, ?, ?, ?, ?)
    `);
    this.insertNetworkStmt = db.prepare(`
      INSERT INTO network_metrics (
        snapshot_id, bytes_sent, bytes_recv, errors_in, errors_out, drops_in, drops_out
      ) VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    this.selectSnapshotsStmt = db.prepare(SELECT_SNAPSHOTS);
    this.selectDisksStmt = db.prepare(`
      SELECT mount_point, device, fs_type, total_bytes, used_bytes, free_bytes, percent_used
      FROM disk_metrics WHERE snapshot_id = ? ORDER BY mount_point
    `);

    this.insertAll = db.transaction((snapshot: MetricSnapshot): boolean => this.insertRows(snapshot));
  }

  async write(snapshot: MetricSnapshot): Promise<void> {
    let inserted: boolean;
    try {
      inserted = this.insertAll(snapshot);
    } catch (err) {
      throw new StorageError('sqlite', `Failed to write snapshot for ${snapshot.hostname}`, err);
    }

    if (!inserted) {
      this.logger.debug(
        { hostname: snapshot.hostname, timestamp: snapshot.timestamp.toISOString() },
        'Duplicate snapshot ignored',
      );
    }
  }

  async query(filter?: QueryFilter): Promise<MetricSnapshot[]> {
    const { host, since, until, limit } = resolveQuery(filter);

    try {
      const rows = this.selectSnapshotsStmt.all({
        host: host ?? null,
        since: since ? since.getTime() : null,
        until: until ? until.getTime() : null,
        limit,
      }) as SnapshotRow[];

      return rows.map((row) => this.toSnapshot(row));
    } catch (err) {
      throw new StorageError('sqlite', 'Failed to query snapshots', err);
    }
  }

  async ping(): Promise<void> {
    if (this.closed) {
      throw new StorageError('sqlite', 'Database is closed');
    }
    try {
      this.db.prepare('SELECT 1').get();
    } catch (err) {
      throw new StorageError('sqlite', 'Database is not reachable', err);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  private insertRows(snapshot: MetricSnapshot): boolean {
    const result = this.insertSnapshotStmt.run(
      snapshot.hostname,
      snapshot.timestamp.getTime(),
      snapshot.collection_duration_ms ?? null,
    );
    if (result.changes === 0) return false;

    const snapshotId = Number(result.lastInsertRowid);
    const { cpu, memory, swap, disk, network } = snapshot;

    this.insertCpuStmt.run(
      snapshotId,
      cpu.overall_percent,
      JSON.stringify(cpu.per_core_percent),
      cpu.load_avg_1_5_15[0],
      cpu.load_avg_1_5_15[1],
      cpu.load_avg_1_5_15[2],
      cpu.core_count_physical ?? null,
      cpu.core_count_logical ?? null,
    );
    this.insertMemoryStmt.run(
      snapshotId,
      memory.total_bytes,
      memory.used_bytes,
      memory.free_bytes,
      memory.available_bytes,
      memory.percent_used,
    );
    if (swap) {
      this.insertSwapStmt.run(
        snapshotId,
        swap.total_bytes,
        swap.used_bytes,
        swap.free_bytes,
        swap.percent_used,
      );
    }
    for (const fs of disk.filesystems) {
      this.insertDiskStmt.run(
        snapshotId,
        fs.mount_point,
        fs.device ?? null,
        fs.fs_type ?? null,
        fs.total_bytes,
        fs.used_bytes,
        fs.free_bytes,
        fs.percent_used,
      );
    }
    if (disk.io) {
      this.insertDiskIoStmt.run(
        snapshotId,
        disk.io.read_count,
        disk.io.write_count,
        disk.io.read_bytes,
        disk.io.write_bytes,
      );
    }
    this.insertNetworkStmt.run(
      snapshotId,
      network.bytes_sent,
      network.bytes_recv,
      network.errors_in,
      network.errors_out,
      network.drops_in ?? null,
      network.drops_out ?? null,
    );

    return true;
  }

  private toSnapshot(row: SnapshotRow): MetricSnapshot {
    const disks = this.selectDisksStmt.all(row.id) as DiskRow[];
    const filesystems: FilesystemUsage[] = disks.map((disk) => ({
      mount_point: disk.mount_point,
      ...(disk.device !== null ? { device: disk.device } : {}),
      ...(disk.fs_type !== null ? { fs_type: disk.fs_type } : {}),
      total_bytes: disk.total_bytes,
      used_bytes: disk.used_bytes,
      free_bytes: disk.free_bytes,
      percent_used: disk.percent_used,
    }));

    const perCore: unknown = JSON.parse(row.per_core_percent);

    return {
      hostname: row.hostname,
      timestamp: new Date(row.timestamp),
      ...(row.collection_duration_ms !== null
        ? { collection_duration_ms: row.collection_duration_ms }
        : {}),
      cpu: {
        overall_percent: row.overall_percent,
        per_core_percent: Array.isArray(perCore) ? perCore.filter(isNumber) : [],
        load_avg_1_5_15: [row.load_avg_1, row.load_avg_5, row.load_avg_15],
        ...(row.core_count_physical !== null ? { core_count_physical: row.core_count_physical } : {}),
        ...(row.core_count_logical !== null ? { core_count_logical: row.core_count_logical } : {}),
      },
      memory: {
        total_bytes: row.mem_total,
        used_bytes: row.mem_used,
        free_bytes: row.mem_free,
        available_bytes: row.mem_available,
        percent_used: row.mem_percent,
      },
      ...(row.swap_total !== null &&
      row.swap_used !== null &&
      row.swap_free !== null &&
      row.swap_percent !== null
        ? {
            swap: {
              total_bytes: row.swap_total,
              used_bytes: row.swap_used,
              free_bytes: row.swap_free,
              percent_used: row.swap_percent,
            },
          }
        : {}),
      disk: {
        filesystems,
        ...(row.io_read_count !== null &&
        row.io_write_count !== null &&
        row.io_read_bytes !== null &&
        row.io_write_bytes !== null
          ? {
              io: {
                read_count: row.io_read_count,
                write_count: row.io_write_count,
                read_bytes: row.io_read_bytes,
                write_bytes: row.io_write_bytes,
              },
            }
          : {}),
      },
      network: {
        bytes_sent: row.bytes_sent,
        bytes_recv: row.bytes_recv,
        errors_in: row.errors_in,
        errors_out: row.errors_out,
        ...(row.drops_in !== null ? { drops_in: row.drops_in } : {}),
        ...(row.drops_out !== null ? { drops_out: row.drops_out } : {}),
      },
    };
  }
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number';
}
