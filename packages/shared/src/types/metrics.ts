/**
 * One sampling round of host metrics. Keys follow the wire format, so a
 * snapshot serializes to the `/ingest` body without a mapping step.
 */
export interface MetricSnapshot {
  readonly hostname: string;
  readonly timestamp: Date;
  readonly collection_duration_ms?: number;
  readonly cpu: CpuMetrics;
  readonly memory: MemoryMetrics;
  readonly swap?: SwapMetrics;
  readonly disk: DiskMetrics;
  readonly network: NetworkMetrics;
}

export interface CpuMetrics {
  readonly overall_percent: number;
  readonly per_core_percent: readonly number[];
  readonly load_avg_1_5_15: readonly [number, number, number];
  readonly core_count_physical?: number;
  readonly core_count_logical?: number;
}

export interface MemoryMetrics {
  readonly total_bytes: number;
  readonly used_bytes: number;
  readonly free_bytes: number;
  readonly available_bytes: number;
  readonly percent_used: number;
}

export interface SwapMetrics {
  readonly total_bytes: number;
  readonly used_bytes: number;
  readonly free_bytes: number;
  readonly percent_used: number;
}

export interface FilesystemUsage {
  readonly mount_point: string;
  readonly device?: string;
  readonly fs_type?: string;
  readonly total_bytes: number;
  readonly used_bytes: number;
  readonly free_bytes: number;
  readonly percent_used: number;
}

export interface DiskIoCounters {
  readonly read_count: number;
  readonly write_count: number;
  readonly read_bytes: number;
  readonly write_bytes: number;
}

export interface DiskMetrics {
  readonly filesystems: readonly FilesystemUsage[];
  readonly io?: DiskIoCounters;
}

export interface NetworkMetrics {
  readonly bytes_sent: number;
  readonly bytes_recv: number;
  readonly errors_in: number;
  readonly errors_out: number;
  readonly drops_in?: number;
  readonly drops_out?: number;
}

/** Body of `POST /ingest`. */
export interface IngestPayload {
  hostname: string;
  metrics: MetricSnapshot;
}

export type IngestResult =
  | { status: 'accepted' }
  | { status: 'rejected'; reason: string };

export interface QueryFilter {
  host?: string;
  since?: Date;
  until?: Date;
  limit?: number;
}
