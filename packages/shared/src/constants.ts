import { homedir } from 'node:os';
import { join } from 'node:path';

export const HOSTPULSE_HOME = process.env.HOSTPULSE_HOME || join(homedir(), '.hostpulse');
export const HOSTPULSE_DB_FILE = join(HOSTPULSE_HOME, 'metrics.db');

export const HOSTPULSE_CONFIG_FILES = [
  'hostpulse.config.yaml',
  'hostpulse.config.yml',
  'hostpulse.config.json',
];

export const DEFAULT_INTERVAL_SECONDS = 30;
export const DEFAULT_ENDPOINT_TIMEOUT_SECONDS = 10;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_SECONDS = 1;
export const DEFAULT_MAX_DELAY_SECONDS = 30;
export const DEFAULT_BACKOFF_JITTER = 0.2;
export const DEFAULT_QUEUE_DEPTH = 1;
export const DEFAULT_SHUTDOWN_GRACE_SECONDS = 5;

export const DEFAULT_THRESHOLDS = {
  cpu: 80,
  memory: 85,
  disk: 90,
  swap: 50,
} as const;
export const DEFAULT_COOLDOWN_MINUTES = 5;
export const DEFAULT_CHANNEL_RETRIES = 2;
export const DEFAULT_CHANNEL_RETRY_DELAY = 500;
export const DEFAULT_CHANNEL_TIMEOUT = 5000;
export const DEFAULT_HISTORY_SIZE = 500;

export const DEFAULT_SERVER_HOST = '0.0.0.0';
export const DEFAULT_SERVER_PORT = 8000;
export const DEFAULT_QUERY_LIMIT = 1000;
export const MAX_QUERY_LIMIT = 10_000;
export const DEFAULT_INFLUXDB_BUCKET = 'metrics';

/** How far ahead of the ingestion clock a snapshot timestamp may be. */
export const MAX_CLOCK_SKEW_MS = 5 * 60 * 1000;

export const HOSTPULSE_VERSION = '0.3.0';
