export type {
  MetricSnapshot,
  CpuMetrics,
  MemoryMetrics,
  SwapMetrics,
  FilesystemUsage,
  DiskIoCounters,
  DiskMetrics,
  NetworkMetrics,
  IngestPayload,
  IngestResult,
  QueryFilter,
} from './metrics.js';

export type {
  MetricKey,
  AlertSeverity,
  ChannelName,
  AlertKey,
  AlertPhase,
  AlertState,
  AlertEvent,
  ThresholdRule,
  AlertPolicy,
} from './alerts.js';

export type { EventBusMessage } from './events.js';
