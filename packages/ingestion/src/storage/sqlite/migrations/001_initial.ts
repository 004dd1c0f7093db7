import type BetterSqlite3 from 'better-sqlite3';

export function up(db: BetterSqlite3.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS snapshots (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      hostname TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      collection_duration_ms REAL,
      received_at INTEGER NOT NULL DEFAULT (unixepoch()),
      UNIQUE (hostname, timestamp)
    );

    CREATE INDEX IF NOT EXISTS idx_snapshots_time
      ON snapshots(timestamp, hostname);

    CREATE TABLE IF NOT EXISTS cpu_metrics (
      snapshot_id INTEGER PRIMARY KEY,
      overall_percent REAL NOT NULL,
      per_core_percent TEXT NOT NULL,
      load_avg_1 REAL NOT NULL,
      load_avg_5 REAL NOT NULL,
      load_avg_15 REAL NOT NULL,
      core_count_physical INTEGER,
      core_count_logical INTEGER,
      FOREIGN KEY (snapshot_id) REFERENCES snapshots(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS memory_metrics (
      snapshot_id INTEGER PRIMARY KEY,
      total_bytes INTEGER NOT NULL,
      used_bytes INTEGER NOT NULL,
      free_bytes INTEGER NOT NULL,
      available_bytes INTEGER NOT NULL,
      percent_used REAL NOT NULL,
      FOREIGN KEY (snapshot_id) REFERENCES snapshots(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS swap_metrics (
      snapshot_id INTEGER PRIMARY KEY,
      total_bytes INTEGER NOT NULL,
      used_bytes INTEGER NOT NULL,
      free_bytes INTEGER NOT NULL,
      percent_used REAL NOT NULL,
      FOREIGN KEY (snapshot_id) REFERENCES snapshots(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS disk_metrics (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      snapshot_id INTEGER NOT NULL,
      mount_point TEXT NOT NULL,
      device TEXT,
      fs_type TEXT,
      total_bytes INTEGER NOT NULL,
      used_bytes INTEGER NOT NULL,
      free_bytes INTEGER NOT NULL,
      percent_used REAL NOT NULL,
      UNIQUE (snapshot_id, mount_point),
      FOREIGN KEY (snapshot_id) REFERENCES snapshots(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS disk_io_metrics (
      snapshot_id INTEGER PRIMARY KEY,
      read_count INTEGER NOT NULL,
      write_count INTEGER NOT NULL,
      read_bytes INTEGER NOT NULL,
      write_bytes INTEGER NOT NULL,
      FOREIGN KEY (snapshot_id) REFERENCES snapshots(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS network_metrics (
      snapshot_id INTEGER PRIMARY KEY,
      bytes_sent INTEGER NOT NULL,
      bytes_recv INTEGER NOT NULL,
      errors_in INTEGER NOT NULL,
      errors_out INTEGER NOT NULL,
      drops_in INTEGER,
      drops_out INTEGER,
      FOREIGN KEY (snapshot_id) REFERENCES snapshots(id) ON DELETE CASCADE
    );
  `);
}
