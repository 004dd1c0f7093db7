import { vi } from 'vitest';
import type { AlertEvent, Logger, MetricSnapshot } from '@hostpulse/shared';
import type { SeriesPoint } from '../storage/influx/points.js';
import type { PointRange, PointStore } from '../storage/influx/PointStore.js';

export function createMockLogger() {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export function asLogger(mock: ReturnType<typeof createMockLogger>): Logger {
  return mock as unknown as Logger;
}

export const T0 = Date.UTC(2024, 4, 1, 12, 0, 0);
export const MINUTE = 60_000;

export function at(offsetMs: number = 0): Date {
  return new Date(T0 + offsetMs);
}

export interface SnapshotOptions {
  hostname?: string;
  timestamp?: Date;
  cpu?: number;
  memory?: number;
  swap?: number | null;
  disks?: Array<{ mount: string; percent: number }>;
  io?: boolean;
}

/** A complete, valid snapshot. Percentages map onto 1000-byte capacities. */
export function makeSnapshot(options: SnapshotOptions = {}): MetricSnapshot {
  const memoryPercent = options.memory ?? 40;
  const memoryUsed = Math.round(memoryPercent * 10);
  const disks = options.disks ?? [{ mount: '/', percent: 50 }];

  const snapshot: MetricSnapshot = {
    hostname: options.hostname ?? 'h1',
    timestamp: options.timestamp ?? at(0),
    collection_duration_ms: 12.5,
    cpu: {
      overall_percent: options.cpu ?? 12.5,
      per_core_percent: [10, 15],
      load_avg_1_5_15: [0.5, 0.25, 0.125],
      core_count_physical: 2,
      core_count_logical: 4,
    },
    memory: {
      total_bytes: 1000,
      used_bytes: memoryUsed,
      free_bytes: 1000 - memoryUsed,
      available_bytes: 1000 - memoryUsed,
      percent_used: memoryPercent,
    },
    disk: {
      filesystems: disks.map(({ mount, percent }) => {
        const used = Math.round(percent * 10);
        return {
          mount_point: mount,
          device: '/dev/sda1',
          fs_type: 'ext4',
          total_bytes: 1000,
          used_bytes: used,
          free_bytes: 1000 - used,
          percent_used: percent,
        };
      }),
      ...(options.io === false
        ? {}
        : { io: { read_count: 10, write_count: 20, read_bytes: 4096, write_bytes: 8192 } }),
    },
    network: {
      bytes_sent: 100,
      bytes_recv: 200,
      errors_in: 0,
      errors_out: 1,
      drops_in: 2,
      drops_out: 0,
    },
  };

  if (options.swap === null) return snapshot;

  const swapPercent = options.swap ?? 20;
  const swapUsed = Math.round(swapPercent * 5);
  return {
    ...snapshot,
    swap: {
      total_bytes: 500,
      used_bytes: swapUsed,
      free_bytes: 500 - swapUsed,
      percent_used: swapPercent,
    },
  };
}

/** The JSON a collector would POST for `snapshot`. */
export function toWire(snapshot: MetricSnapshot): { hostname: string; metrics: Record<string, unknown> } {
  return JSON.parse(JSON.stringify({ hostname: snapshot.hostname, metrics: snapshot }));
}

export function makeAlertEvent(overrides: Partial<AlertEvent> = {}): AlertEvent {
  return {
    id: 'alert-1',
    key: { hostname: 'h1', metric: 'cpu' },
    kind: 'firing',
    severity: 'error',
    value: 92,
    threshold: 80,
    firedAt: at(0),
    message: 'cpu on h1 at 92% (threshold 80%)',
    ...overrides,
  };
}

function seriesKey(point: SeriesPoint): string {
  const tags = Object.keys(point.tags)
    .sort()
    .map((key) => `${key}=${point.tags[key]}`)
    .join(',');
  return `${point.measurement}|${tags}|${point.timestamp.getTime()}`;
}

/** In-process stand-in for an InfluxDB bucket: identical series points overwrite. */
export class InMemoryPointStore implements PointStore {
  points: Map<string, SeriesPoint> = new Map();
  writes: number = 0;
  writeError: Error | null = null;
  readError: Error | null = null;
  pingError: Error | null = null;
  closed: boolean = false;
  reads: PointRange[] = [];

  async write(points: SeriesPoint[]): Promise<void> {
    if (this.writeError) throw this.writeError;
    this.writes++;
    for (const point of points) {
      this.points.set(seriesKey(point), point);
    }
  }

  async read(range: PointRange): Promise<SeriesPoint[]> {
    if (this.readError) throw this.readError;
    this.reads.push(range);
    return this.inRange(range);
  }

  async hasSnapshot(hostname: string, timestamp: Date): Promise<boolean> {
    if (this.readError) throw this.readError;
    return this.inRange({
      host: hostname,
      start: timestamp,
      stop: new Date(timestamp.getTime() + 1),
    }).some((point) => point.measurement === 'cpu');
  }

  async latestTimestamps(range: PointRange, limit: number): Promise<Date[]> {
    if (this.readError) throw this.readError;
    return this.inRange(range)
      .filter((point) => point.measurement === 'cpu')
      .map((point) => point.timestamp)
      .sort((a, b) => b.getTime() - a.getTime())
      .slice(0, limit);
  }

  private inRange(range: PointRange): SeriesPoint[] {
    return Array.from(this.points.values()).filter((point) => {
      const time = point.timestamp.getTime();
      if (time < range.start.getTime() || time >= range.stop.getTime()) return false;
      return range.host === undefined || point.tags.hostname === range.host;
    });
  }

  async ping(): Promise<void> {
    if (this.pingError) throw this.pingError;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
