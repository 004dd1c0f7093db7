import type {
  CpuMetrics,
  DiskIoCounters,
  FilesystemUsage,
  MemoryMetrics,
  MetricSnapshot,
  NetworkMetrics,
  SwapMetrics,
} from '@hostpulse/shared';
import { compareSnapshots } from '../StorageAdapter.js';

export type Measurement = 'cpu' | 'cpu_core' | 'memory' | 'swap' | 'disk' | 'disk_io' | 'network';

export const MEASUREMENTS: readonly Measurement[] = [
  'cpu',
  'cpu_core',
  'memory',
  'swap',
  'disk',
  'disk_io',
  'network',
];

export const TAG_KEYS = ['hostname', 'core', 'mount_point', 'device', 'fs_type'] as const;

/** One time-series point, independent of the client library's Point class. */
export interface SeriesPoint {
  measurement: Measurement;
  tags: Record<string, string>;
  fields: Record<string, number>;
  timestamp: Date;
}

function isMeasurement(value: unknown): value is Measurement {
  return typeof value === 'string' && MEASUREMENTS.some((m) => m === value);
}

function optionalFields(values: Record<string, number | undefined>): Record<string, number> {
  const fields: Record<string, number> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) fields[key] = value;
  }
  return fields;
}

export function snapshotToPoints(snapshot: MetricSnapshot): SeriesPoint[] {
  const { hostname, timestamp, cpu, memory, swap, disk, network } = snapshot;
  const point = (
    measurement: Measurement,
    fields: Record<string, number>,
    tags: Record<string, string> = {},
  ): SeriesPoint => ({ measurement, tags: { hostname, ...tags }, fields, timestamp });

  const points: SeriesPoint[] = [
    point(
      'cpu',
      optionalFields({
        overall_percent: cpu.overall_percent,
        load_avg_1: cpu.load_avg_1_5_15[0],
        load_avg_5: cpu.load_avg_1_5_15[1],
        load_avg_15: cpu.load_avg_1_5_15[2],
        core_count_physical: cpu.core_count_physical,
        core_count_logical: cpu.core_count_logical,
        collection_duration_ms: snapshot.collection_duration_ms,
      }),
    ),
    ...cpu.per_core_percent.map((percent, index) =>
      point('cpu_core', { percent }, { core: String(index) }),
    ),
    point('memory', {
      total_bytes: memory.total_bytes,
      used_bytes: memory.used_bytes,
      free_bytes: memory.free_bytes,
      available_bytes: memory.available_bytes,
      percent_used: memory.percent_used,
    }),
    ...disk.filesystems.map((fs) => {
      const tags: Record<string, string> = { mount_point: fs.mount_point };
      if (fs.device) tags.device = fs.device;
      if (fs.fs_type) tags.fs_type = fs.fs_type;
      return point(
        'disk',
        {
          total_bytes: fs.total_bytes,
          used_bytes: fs.used_bytes,
          free_bytes: fs.free_bytes,
          percent_used: fs.percent_used,
        },
        tags,
      );
    }),
    point(
      'network',
      optionalFields({
        bytes_sent: network.bytes_sent,
        bytes_recv: network.bytes_recv,
        errors_in: network.errors_in,
        errors_out: network.errors_out,
        drops_in: network.drops_in,
        drops_out: network.drops_out,
      }),
    ),
  ];

  if (swap) {
    points.push(
      point('swap', {
        total_bytes: swap.total_bytes,
        used_bytes: swap.used_bytes,
        free_bytes: swap.free_bytes,
        percent_used: swap.percent_used,
      }),
    );
  }

  if (disk.io) {
    points.push(
      point('disk_io', {
        read_count: disk.io.read_count,
        write_count: disk.io.write_count,
        read_bytes: disk.io.read_bytes,
        write_bytes: disk.io.write_bytes,
      }),
    );
  }

  return points;
}

/**
 * Convert a pivoted Flux row (one column per field) back into a point.
 * Returns null for rows of unknown measurements or without a hostname.
 */
export function rowToPoint(row: Record<string, unknown>): SeriesPoint | null {
  const measurement = row._measurement;
  const time = row._time;
  if (!isMeasurement(measurement) || typeof time !== 'string') return null;

  const tags: Record<string, string> = {};
  for (const key of TAG_KEYS) {
    const value = row[key];
    if (typeof value === 'string' && value !== '') tags[key] = value;
  }
  if (!tags.hostname) return null;

  const fields: Record<string, number> = {};
  for (const [key, value] of Object.entries(row)) {
    if (key.startsWith('_') || key === 'result' || key === 'table') continue;
    if (typeof value === 'number' && Number.isFinite(value)) fields[key] = value;
  }

  return { measurement, tags, fields, timestamp: new Date(time) };
}

interface SnapshotParts {
  hostname: string;
  timestamp: Date;
  cpu?: Record<string, number>;
  cores: Array<{ index: number; percent: number }>;
  memory?: Record<string, number>;
  swap?: Record<string, number>;
  disks: Array<{ tags: Record<string, string>; fields: Record<string, number> }>;
  io?: Record<string, number>;
  network?: Record<string, number>;
}

function field(fields: Record<string, number> | undefined, key: string): number {
  return fields?.[key] ?? 0;
}

function assemble(parts: SnapshotParts): MetricSnapshot {
  const { cpu: cpuFields } = parts;

  const cpu: CpuMetrics = {
    overall_percent: field(cpuFields, 'overall_percent'),
    per_core_percent: [...parts.cores]
      .sort((a, b) => a.index - b.index)
      .map((core) => core.percent),
    load_avg_1_5_15: [
      field(cpuFields, 'load_avg_1'),
      field(cpuFields, 'load_avg_5'),
      field(cpuFields, 'load_avg_15'),
    ],
    ...(cpuFields?.core_count_physical !== undefined
      ? { core_count_physical: cpuFields.core_count_physical }
      : {}),
    ...(cpuFields?.core_count_logical !== undefined
      ? { core_count_logical: cpuFields.core_count_logical }
      : {}),
  };

  const memory: MemoryMetrics = {
    total_bytes: field(parts.memory, 'total_bytes'),
    used_bytes: field(parts.memory, 'used_bytes'),
    free_bytes: field(parts.memory, 'free_bytes'),
    available_bytes: field(parts.memory, 'available_bytes'),
    percent_used: field(parts.memory, 'percent_used'),
  };

  const swap: SwapMetrics | undefined = parts.swap && {
    total_bytes: field(parts.swap, 'total_bytes'),
    used_bytes: field(parts.swap, 'used_bytes'),
    free_bytes: field(parts.swap, 'free_bytes'),
    percent_used: field(parts.swap, 'percent_used'),
  };

  const filesystems: FilesystemUsage[] = parts.disks
    .map(({ tags, fields }) => ({
      mount_point: tags.mount_point,
      ...(tags.device ? { device: tags.device } : {}),
      ...(tags.fs_type ? { fs_type: tags.fs_type } : {}),
      total_bytes: field(fields, 'total_bytes'),
      used_bytes: field(fields, 'used_bytes'),
      free_bytes: field(fields, 'free_bytes'),
      percent_used: field(fields, 'percent_used'),
    }))
    .sort((a, b) => (a.mount_point < b.mount_point ? -1 : a.mount_point > b.mount_point ? 1 : 0));

  const io: DiskIoCounters | undefined = parts.io && {
    read_count: field(parts.io, 'read_count'),
    write_count: field(parts.io, 'write_count'),
    read_bytes: field(parts.io, 'read_bytes'),
    write_bytes: field(parts.io, 'write_bytes'),
  };

  const network: NetworkMetrics = {
    bytes_sent: field(parts.network, 'bytes_sent'),
    bytes_recv: field(parts.network, 'bytes_recv'),
    errors_in: field(parts.network, 'errors_in'),
    errors_out: field(parts.network, 'errors_out'),
    ...(parts.network?.drops_in !== undefined ? { drops_in: parts.network.drops_in } : {}),
    ...(parts.network?.drops_out !== undefined ? { drops_out: parts.network.drops_out } : {}),
  };

  const duration = cpuFields?.collection_duration_ms;

  return {
    hostname: parts.hostname,
    timestamp: parts.timestamp,
    ...(duration !== undefined ? { collection_duration_ms: duration } : {}),
    cpu,
    memory,
    ...(swap ? { swap } : {}),
    disk: io ? { filesystems, io } : { filesystems },
    network,
  };
}

/** Regroup points by `(hostname, timestamp)` into snapshots, oldest first. */
export function pointsToSnapshots(points: SeriesPoint[]): MetricSnapshot[] {
  const groups = new Map<string, SnapshotParts>();

  for (const point of points) {
    const hostname = point.tags.hostname;
    if (!hostname) continue;

    const groupKey = `${hostname}|${point.timestamp.getTime()}`;
    let parts = groups.get(groupKey);
    if (!parts) {
      parts = { hostname, timestamp: point.timestamp, cores: [], disks: [] };
      groups.set(groupKey, parts);
    }

    switch (point.measurement) {
      case 'cpu':
        parts.cpu = point.fields;
        break;
      case 'cpu_core': {
        const index = Number(point.tags.core);
        const percent = point.fields.percent;
        if (Number.isInteger(index) && percent !== undefined) {
          parts.cores.push({ index, percent });
        }
        break;
      }
      case 'memory':
        parts.memory = point.fields;
        break;
      case 'swap':
        parts.swap = point.fields;
        break;
      case 'disk':
        if (point.tags.mount_point) parts.disks.push({ tags: point.tags, fields: point.fields });
        break;
      case 'disk_io':
        parts.io = point.fields;
        break;
      case 'network':
        parts.network = point.fields;
        break;
    }
  }

  return Array.from(groups.values(), assemble).sort(compareSnapshots);
}
