import { DEFAULT_QUERY_LIMIT, MAX_QUERY_LIMIT } from '@hostpulse/shared';
import type { MetricSnapshot, QueryFilter } from '@hostpulse/shared';

export type StorageBackend = 'sqlite' | 'influxdb';

/**
 * Durable home for accepted snapshots. Implementations are append-only,
 * write each snapshot atomically, keep one record per `(hostname, timestamp)`
 * and return query results in ascending timestamp order with hostname as the
 * tie-break.
 */
export interface StorageAdapter {
  readonly backend: StorageBackend;
  write(snapshot: MetricSnapshot): Promise<void>;
  /** The latest `limit` matching snapshots, oldest first. Bounds are inclusive. */
  query(filter?: QueryFilter): Promise<MetricSnapshot[]>;
  /** Resolves when the backend is reachable; rejects with StorageError otherwise. */
  ping(): Promise<void>;
  close(): Promise<void>;
}

export interface ResolvedQuery {
  host?: string;
  since?: Date;
  until?: Date;
  limit: number;
}

export function resolveQuery(filter: QueryFilter = {}): ResolvedQuery {
  const requested = filter.limit ?? DEFAULT_QUERY_LIMIT;
  const limit = Math.min(Math.max(1, Math.floor(requested)), MAX_QUERY_LIMIT);
  return { host: filter.host, since: filter.since, until: filter.until, limit };
}

/** Ascending by timestamp, then hostname. */
export function compareSnapshots(a: MetricSnapshot, b: MetricSnapshot): number {
  const byTime = a.timestamp.getTime() - b.timestamp.getTime();
  if (byTime !== 0) return byTime;
  return a.hostname < b.hostname ? -1 : a.hostname > b.hostname ? 1 : 0;
}
