import type { SeriesPoint } from './points.js';

export interface PointRange {
  host?: string;
  /** Inclusive. */
  start: Date;
  /** Exclusive. */
  stop: Date;
}

/**
 * Minimal time-series store contract the InfluxDB backend is written
 * against. Points with the same measurement, tag set and timestamp replace
 * each other.
 */
export interface PointStore {
  write(points: SeriesPoint[]): Promise<void>;
  read(range: PointRange): Promise<SeriesPoint[]>;
  /** Whether a snapshot for `hostname` was already written at `timestamp`. */
  hasSnapshot(hostname: string, timestamp: Date): Promise<boolean>;
  /** Timestamps of the newest `limit` snapshots in `range`, newest first. */
  latestTimestamps(range: PointRange, limit: number): Promise<Date[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
