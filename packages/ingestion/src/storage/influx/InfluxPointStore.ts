import { InfluxDB, Point, flux, fluxInteger } from '@influxdata/influxdb-client';
import type { ParameterizedQuery } from '@influxdata/influxdb-client';
import { HealthAPI } from '@influxdata/influxdb-client-apis';
import { rowToPoint } from './points.js';
import type { SeriesPoint } from './points.js';
import type { PointRange, PointStore } from './PointStore.js';

export interface InfluxPointStoreOptions {
  url: string;
  token: string;
  org: string;
  bucket: string;
  /** Request timeout in ms. */
  timeout: number;
}

function rangeLines(bucket: string, range: PointRange): ParameterizedQuery[] {
  const lines = [
    flux`from(bucket: ${bucket})`,
    flux`  |> range(start: ${range.start}, stop: ${range.stop})`,
  ];
  if (range.host !== undefined) {
    lines.push(flux`  |> filter(fn: (r) => r.hostname == ${range.host})`);
  }
  return lines;
}

// Every snapshot writes exactly one cpu point, so its overall field marks
// one snapshot.
const SNAPSHOT_MARKER = flux`  |> filter(fn: (r) => r._measurement == "cpu" and r._field == "overall_percent")`;

function render(lines: ParameterizedQuery[]): string {
  return lines.map((line) => line.toString()).join('\n');
}

/** Build the Flux query that returns one pivoted row per point in `range`. */
export function buildRangeQuery(bucket: string, range: PointRange): string {
  return render([
    ...rangeLines(bucket, range),
    flux`  |> pivot(rowKey: ["_time"], columnKey: ["_field"], valueColumn: "_value")`,
  ]);
}

/** Newest `limit` snapshot times in `range`, across hosts, newest first. */
export function buildLatestQuery(bucket: string, range: PointRange, limit: number): string {
  return render([
    ...rangeLines(bucket, range),
    SNAPSHOT_MARKER,
    flux`  |> group()`,
    flux`  |> sort(columns: ["_time"], desc: true)`,
    flux`  |> limit(n: ${fluxInteger(limit)})`,
    flux`  |> keep(columns: ["_time"])`,
  ]);
}

/** At most one row when `hostname` already has a snapshot at `timestamp`. */
export function buildExistsQuery(bucket: string, hostname: string, timestamp: Date): string {
  const range = { host: hostname, start: timestamp, stop: new Date(timestamp.getTime() + 1) };
  return render([...rangeLines(bucket, range), SNAPSHOT_MARKER, flux`  |> limit(n: 1)`]);
}

function toPoint(point: SeriesPoint): Point {
  const out = new Point(point.measurement).timestamp(point.timestamp);
  for (const [key, value] of Object.entries(point.tags)) {
    out.tag(key, value);
  }
  for (const [key, value] of Object.entries(point.fields)) {
    out.floatField(key, value);
  }
  return out;
}

/** PointStore backed by an InfluxDB 2.x server. */
export class InfluxPointStore implements PointStore {
  private client: InfluxDB;
  private health: HealthAPI;
  private options: InfluxPointStoreOptions;

  constructor(options: InfluxPointStoreOptions) {
    this.options = options;
    this.client = new InfluxDB({ url: options.url, token: options.token, timeout: options.timeout });
    this.health = new HealthAPI(this.client);
  }

  async write(points: SeriesPoint[]): Promise<void> {
    if (points.length === 0) return;

    // One write API per snapshot, so close() flushes exactly these points
    // and rejects if the server refuses them.
    const writeApi = this.client.getWriteApi(this.options.org, this.options.bucket, 'ms', {
      batchSize: points.length + 1,
      flushInterval: 0,
      maxRetries: 0,
    });
    writeApi.writePoints(points.map(toPoint));
    await writeApi.close();
  }

  async read(range: PointRange): Promise<SeriesPoint[]> {
    const rows = await this.client
      .getQueryApi(this.options.org)
      .collectRows<Record<string, unknown>>(buildRangeQuery(this.options.bucket, range));

    const points: SeriesPoint[] = [];
    for (const row of rows) {
      const point = rowToPoint(row);
      if (point) points.push(point);
    }
    return points;
  }

  async hasSnapshot(hostname: string, timestamp: Date): Promise<boolean> {
    const rows = await this.client
      .getQueryApi(this.options.org)
      .collectRows<Record<string, unknown>>(buildExistsQuery(this.options.bucket, hostname, timestamp));
    return rows.length > 0;
  }

  async latestTimestamps(range: PointRange, limit: number): Promise<Date[]> {
    const rows = await this.client
      .getQueryApi(this.options.org)
      .collectRows<Record<string, unknown>>(buildLatestQuery(this.options.bucket, range, limit));

    const times: Date[] = [];
    for (const row of rows) {
      if (typeof row._time !== 'string') continue;
      const time = new Date(row._time);
      if (!Number.isNaN(time.getTime())) times.push(time);
    }
    return times;
  }

  async ping(): Promise<void> {
    const result = await this.health.getHealth();
    if (result.status !== 'pass') {
      throw new Error(result.message ?? `InfluxDB health check returned "${result.status}"`);
    }
  }

  async close(): Promise<void> {
    // Writes close their own write API; queries hold no connection.
  }
}
