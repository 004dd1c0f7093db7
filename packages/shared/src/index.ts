// Types
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
  MetricKey,
  AlertSeverity,
  ChannelName,
  AlertKey,
  AlertPhase,
  AlertState,
  AlertEvent,
  ThresholdRule,
  AlertPolicy,
  EventBusMessage,
} from './types/index.js';

// Constants
export {
  HOSTPULSE_HOME,
  HOSTPULSE_DB_FILE,
  HOSTPULSE_CONFIG_FILES,
  DEFAULT_INTERVAL_SECONDS,
  DEFAULT_ENDPOINT_TIMEOUT_SECONDS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_BASE_DELAY_SECONDS,
  DEFAULT_MAX_DELAY_SECONDS,
  DEFAULT_BACKOFF_JITTER,
  DEFAULT_QUEUE_DEPTH,
  DEFAULT_SHUTDOWN_GRACE_SECONDS,
  DEFAULT_THRESHOLDS,
  DEFAULT_COOLDOWN_MINUTES,
  DEFAULT_CHANNEL_RETRIES,
  DEFAULT_CHANNEL_RETRY_DELAY,
  DEFAULT_CHANNEL_TIMEOUT,
  DEFAULT_HISTORY_SIZE,
  DEFAULT_SERVER_HOST,
  DEFAULT_SERVER_PORT,
  DEFAULT_QUERY_LIMIT,
  MAX_QUERY_LIMIT,
  DEFAULT_INFLUXDB_BUCKET,
  MAX_CLOCK_SKEW_MS,
  HOSTPULSE_VERSION,
} from './constants.js';

// Schemas
export {
  metricSnapshotSchema,
  ingestPayloadSchema,
  cpuSchema,
  memorySchema,
  swapSchema,
  filesystemSchema,
  diskSchema,
  networkSchema,
  formatIssues,
  freezeSnapshot,
} from './schemas/snapshot.schema.js';

export type { ValidatedIngestPayload } from './schemas/snapshot.schema.js';

export {
  collectorConfigSchema,
  ingestionConfigSchema,
  endpointSchema,
  thresholdSchema,
  thresholdsSchema,
  alertsSchema,
  storageSchema,
  serverSchema,
  durationSchema,
  channelNameSchema,
  logLevelSchema,
} from './schemas/config.schema.js';

export type {
  CollectorConfig,
  IngestionConfig,
  EndpointConfig,
  ThresholdsConfig,
  AlertsConfig,
  StorageConfig,
} from './schemas/config.schema.js';

// Config loading
export {
  resolveConfigPath,
  readConfigFile,
  applyEnvOverrides,
  parseConfig,
  loadCollectorConfig,
  loadIngestionConfig,
} from './config/loader.js';

// Utilities
export {
  parseDuration,
  formatDuration,
  formatBytes,
  formatPercent,
  roundPercent,
  clampPercent,
} from './utils/parser.js';

export { delay, withTimeout, AbortedError } from './utils/delay.js';

export { createLogger, getLogger, setDefaultLogger } from './utils/logger.js';
export type { LogLevel, Logger, CreateLoggerOptions } from './utils/logger.js';

export {
  HostPulseError,
  CollectionError,
  DeliveryError,
  ValidationError,
  StorageError,
  ChannelError,
  ConfigValidationError,
  ConfigLoadError,
  ServiceUnavailableError,
} from './utils/errors.js';
