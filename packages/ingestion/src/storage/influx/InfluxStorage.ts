import { StorageError, getLogger } from '@hostpulse/shared';
import type { Logger, MetricSnapshot, QueryFilter } from '@hostpulse/shared';
import { resolveQuery } from '../StorageAdapter.js';
import type { StorageAdapter } from '../StorageAdapter.js';
import { pointsToSnapshots, snapshotToPoints } from './points.js';
import type { SeriesPoint } from './points.js';
import type { PointRange, PointStore } from './PointStore.js';

const EPOCH = new Date(0);
// Flux rejects stops past the end of its nanosecond range.
const FAR_FUTURE = new Date('2262-01-01T00:00:00.000Z');

/**
 * Time-series backend: every metric group becomes a point tagged with the
 * hostname. A snapshot already stored at the same `(hostname, timestamp)` is
 * kept and the new one dropped, matching the SQLite backend. Writes for one
 * key run one after another so the check and the write cannot interleave.
 */
export class InfluxStorage implements StorageAdapter {
  readonly backend = 'influxdb' as const;
  private store: PointStore;
  private logger: Logger;
  private closed: boolean = false;
  private pendingWrites: Map<string, Promise<void>> = new Map();

  constructor(store: PointStore, logger?: Logger) {
    this.store = store;
    this.logger = logger ?? getLogger().child({ component: 'storage', backend: 'influxdb' });
  }

  async write(snapshot: MetricSnapshot): Promise<void> {
    const key = `${snapshot.hostname}|${snapshot.timestamp.getTime()}`;
    const run = () => this.writeOnce(snapshot);
    const previous = this.pendingWrites.get(key);
    const current = previous ? previous.then(run, run) : run();
    this.pendingWrites.set(key, current);

    try {
      await current;
    } finally {
      if (this.pendingWrites.get(key) === current) {
        this.pendingWrites.delete(key);
      }
    }
  }

  private async writeOnce(snapshot: MetricSnapshot): Promise<void> {
    const { hostname, timestamp } = snapshot;
    const points = snapshotToPoints(snapshot);
    try {
      if (await this.store.hasSnapshot(hostname, timestamp)) {
        this.logger.debug({ hostname, timestamp }, 'Duplicate snapshot ignored');
        return;
      }
      await this.store.write(points);
    } catch (err) {
      throw new StorageError('influxdb', `Failed to write snapshot for ${hostname}`, err);
    }
    this.logger.debug({ hostname, points: points.length }, 'Snapshot written');
  }

  async query(filter?: QueryFilter): Promise<MetricSnapshot[]> {
    const { host, since, until, limit } = resolveQuery(filter);
    const range: PointRange = {
      host,
      start: since ?? EPOCH,
      stop: until ? new Date(until.getTime() + 1) : FAR_FUTURE,
    };

    let points: SeriesPoint[];
    try {
      // Narrow the read to the newest `limit` snapshots before loading points
      const latest = await this.store.latestTimestamps(range, limit);
      if (latest.length === 0) return [];
      if (latest.length === limit) {
        range.start = latest[latest.length - 1];
      }
      points = await this.store.read(range);
    } catch (err) {
      throw new StorageError('influxdb', 'Failed to query snapshots', err);
    }

    // Hosts sharing the oldest timestamp can still overshoot the window
    return pointsToSnapshots(points).slice(-limit);
  }

  async ping(): Promise<void> {
    if (this.closed) {
      throw new StorageError('influxdb', 'Storage is closed');
    }
    try {
      await this.store.ping();
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new StorageError('influxdb', `Server is not reachable: ${detail}`, err);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.store.close();
  }
}
