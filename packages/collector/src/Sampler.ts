import { EventEmitter } from 'node:events';
import { loadavg } from 'node:os';
import si from 'systeminformation';
import {
  CollectionError,
  clampPercent,
  formatBytes,
  formatDuration,
  formatPercent,
  freezeSnapshot,
  getLogger,
} from '@hostpulse/shared';
import type {
  CpuMetrics,
  DiskIoCounters,
  FilesystemUsage,
  Logger,
  MemoryMetrics,
  MetricSnapshot,
  NetworkMetrics,
  SwapMetrics,
} from '@hostpulse/shared';
import type { SamplerOptions } from './types.js';

const EMPTY_CPU: CpuMetrics = {
  overall_percent: 0,
  per_core_percent: [],
  load_avg_1_5_15: [0, 0, 0],
};

const EMPTY_MEMORY: MemoryMetrics = {
  total_bytes: 0,
  used_bytes: 0,
  free_bytes: 0,
  available_bytes: 0,
  percent_used: 0,
};

const EMPTY_NETWORK: NetworkMetrics = {
  bytes_sent: 0,
  bytes_recv: 0,
  errors_in: 0,
  errors_out: 0,
};

interface MemorySection {
  memory: MemoryMetrics;
  swap?: SwapMetrics;
}

function toCounter(value: number | null | undefined): number {
  if (value === null || value === undefined || !Number.isFinite(value) || value < 0) return 0;
  return Math.floor(value);
}

function toLoad(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value < 0) return 0;
  return Math.round(value * 100) / 100;
}

/** Clamp used/free so that used + free never exceeds total. */
function fitCapacity(total: number, used: number, free: number): { used: number; free: number } {
  const fittedUsed = Math.min(used, total);
  return { used: fittedUsed, free: Math.min(free, total - fittedUsed) };
}

function percentOf(part: number, total: number): number {
  return total > 0 ? clampPercent((part / total) * 100) : 0;
}

/**
 * Reads host resource usage on a fixed cadence and emits a frozen
 * `MetricSnapshot` per round as the `'snapshot'` event.
 */
export class Sampler extends EventEmitter {
  private hostname: string;
  private intervalMs: number;
  private logger: Logger;
  private timer: NodeJS.Timeout | null = null;
  private collecting: boolean = false;
  private skippedTicks: number = 0;

  constructor(options: SamplerOptions) {
    super();
    this.hostname = options.hostname;
    this.intervalMs = options.intervalMs;
    this.logger = options.logger ?? getLogger().child({ component: 'sampler' });
  }

  start(): void {
    if (this.timer) return;
    void this.tick();
    this.timer = setInterval(() => void this.tick(), this.intervalMs);
    this.logger.info(
      { hostname: this.hostname, interval: formatDuration(this.intervalMs) },
      'Sampler started',
    );
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info({ hostname: this.hostname }, 'Sampler stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getSkippedTicks(): number {
    return this.skippedTicks;
  }

  async collect(): Promise<MetricSnapshot> {
    const startedAt = performance.now();
    const timestamp = new Date();

    const [cpu, memorySection, filesystems, io, network] = await Promise.all([
      this.readSection('cpu', () => this.readCpu(), EMPTY_CPU),
      this.readSection<MemorySection>('memory', () => this.readMemory(), { memory: EMPTY_MEMORY }),
      this.readSection<FilesystemUsage[]>('disk', () => this.readFilesystems(), []),
      this.readSection<DiskIoCounters | undefined>('disk_io', () => this.readDiskIo(), undefined),
      this.readSection('network', () => this.readNetwork(), EMPTY_NETWORK),
    ]);

    const snapshot: MetricSnapshot = {
      hostname: this.hostname,
      timestamp,
      collection_duration_ms: Math.round((performance.now() - startedAt) * 100) / 100,
      cpu,
      memory: memorySection.memory,
      ...(memorySection.swap ? { swap: memorySection.swap } : {}),
      disk: io ? { filesystems, io } : { filesystems },
      network,
    };

    return freezeSnapshot(snapshot);
  }

  private async tick(): Promise<void> {
    if (this.collecting) {
      this.skippedTicks++;
      this.logger.warn(
        { hostname: this.hostname, skipped: this.skippedTicks },
        'Previous collection still running, skipping tick',
      );
      return;
    }

    this.collecting = true;
    try {
      const snapshot = await this.collect();
      this.logger.debug(
        {
          hostname: this.hostname,
          cpu: formatPercent(snapshot.cpu.overall_percent),
          memoryUsed: formatBytes(snapshot.memory.used_bytes),
          durationMs: snapshot.collection_duration_ms,
        },
        'Snapshot collected',
      );
      this.emit('snapshot', snapshot);
    } catch (err) {
      this.logger.error({ err, hostname: this.hostname }, 'Snapshot collection failed');
    } finally {
      this.collecting = false;
    }
  }

  private async readSection<T>(section: string, read: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await read();
    } catch (cause) {
      const err = new CollectionError(section, cause);
      this.logger.warn({ err, section, hostname: this.hostname }, 'Metric section unavailable');
      return fallback;
    }
  }

  private async readCpu(): Promise<CpuMetrics> {
    const [load, info] = await Promise.all([si.currentLoad(), si.cpu()]);
    const [one, five, fifteen] = loadavg();

    return {
      overall_percent: clampPercent(load.currentLoad),
      per_core_percent: load.cpus.map((core) => clampPercent(core.load)),
      load_avg_1_5_15: [toLoad(one), toLoad(five), toLoad(fifteen)],
      core_count_physical: toCounter(info.physicalCores),
      core_count_logical: toCounter(info.cores),
    };
  }

  private async readMemory(): Promise<MemorySection> {
    const mem = await si.mem();

    const total = toCounter(mem.total);
    const available = Math.min(toCounter(mem.available), total);
    const { used, free } = fitCapacity(total, total - available, toCounter(mem.free));

    const memory: MemoryMetrics = {
      total_bytes: total,
      used_bytes: used,
      free_bytes: free,
      available_bytes: available,
      percent_used: percentOf(used, total),
    };

    const swapTotal = toCounter(mem.swaptotal);
    if (swapTotal === 0) return { memory };

    const swapFit = fitCapacity(swapTotal, toCounter(mem.swapused), toCounter(mem.swapfree));
    return {
      memory,
      swap: {
        total_bytes: swapTotal,
        used_bytes: swapFit.used,
        free_bytes: swapFit.free,
        percent_used: percentOf(swapFit.used, swapTotal),
      },
    };
  }

  private async readFilesystems(): Promise<FilesystemUsage[]> {
    const entries = await si.fsSize();
    const seen = new Set<string>();
    const filesystems: FilesystemUsage[] = [];

    for (const entry of entries) {
      if (!entry.mount || seen.has(entry.mount)) continue;

      const total = toCounter(entry.size);
      if (total === 0) {
        this.logger.debug({ mount: entry.mount }, 'Skipping filesystem without a size');
        continue;
      }

      seen.add(entry.mount);
      const { used, free } = fitCapacity(total, toCounter(entry.used), toCounter(entry.available));
      filesystems.push({
        mount_point: entry.mount,
        device: entry.fs || undefined,
        fs_type: entry.type || undefined,
        total_bytes: total,
        used_bytes: used,
        free_bytes: free,
        percent_used: Number.isFinite(entry.use) ? clampPercent(entry.use) : percentOf(used, total),
      });
    }

    return filesystems;
  }

  private async readDiskIo(): Promise<DiskIoCounters | undefined> {
    const [io, stats] = await Promise.all([si.disksIO(), si.fsStats()]);
    // Both come back null on platforms without block device counters.
    if (!io || !stats) return undefined;

    return {
      read_count: toCounter(io.rIO),
      write_count: toCounter(io.wIO),
      read_bytes: toCounter(stats.rx),
      write_bytes: toCounter(stats.wx),
    };
  }

  private async readNetwork(): Promise<NetworkMetrics> {
    const interfaces = await si.networkStats('*');

    return interfaces.reduce<NetworkMetrics>(
      (totals, iface) => ({
        bytes_sent: totals.bytes_sent + toCounter(iface.tx_bytes),
        bytes_recv: totals.bytes_recv + toCounter(iface.rx_bytes),
        errors_in: totals.errors_in + toCounter(iface.rx_errors),
        errors_out: totals.errors_out + toCounter(iface.tx_errors),
        drops_in: (totals.drops_in ?? 0) + toCounter(iface.rx_dropped),
        drops_out: (totals.drops_out ?? 0) + toCounter(iface.tx_dropped),
      }),
      { ...EMPTY_NETWORK, drops_in: 0, drops_out: 0 },
    );
  }
}
