import { z } from 'zod';
import {
  DEFAULT_BASE_DELAY_SECONDS,
  DEFAULT_CHANNEL_RETRIES,
  DEFAULT_COOLDOWN_MINUTES,
  DEFAULT_ENDPOINT_TIMEOUT_SECONDS,
  DEFAULT_HISTORY_SIZE,
  DEFAULT_INFLUXDB_BUCKET,
  DEFAULT_INTERVAL_SECONDS,
  DEFAULT_MAX_DELAY_SECONDS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_QUEUE_DEPTH,
  DEFAULT_SERVER_HOST,
  DEFAULT_SERVER_PORT,
  DEFAULT_SHUTDOWN_GRACE_SECONDS,
  DEFAULT_THRESHOLDS,
  HOSTPULSE_DB_FILE,
} from '../constants.js';
import { parseDuration } from '../utils/parser.js';

/** Numbers are seconds; strings go through `ms` ('500ms', '10s', '2m'). */
export const durationSchema = z
  .union([z.number().nonnegative(), z.string().min(1)])
  .transform((value, ctx) => {
    if (typeof value === 'number') return value * 1000;
    try {
      return parseDuration(value);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  });

const percentSchema = z.number().min(0).max(100);

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export const endpointSchema = z.object({
  url: z.string().url(),
  timeout: durationSchema.default(DEFAULT_ENDPOINT_TIMEOUT_SECONDS),
  max_retries: z.number().int().min(1).default(DEFAULT_MAX_RETRIES),
  base_delay: durationSchema.default(DEFAULT_BASE_DELAY_SECONDS),
  max_delay: durationSchema.default(DEFAULT_MAX_DELAY_SECONDS),
  queue_depth: z.number().int().min(1).max(2).default(DEFAULT_QUEUE_DEPTH),
});

export const thresholdSchema = z
  .union([
    percentSchema,
    z.object({
      value: percentSchema,
      cooldown_minutes: z.number().nonnegative().optional(),
      recovery: percentSchema.optional(),
    }),
  ])
  .transform(
    (value): { value: number; cooldown_minutes?: number; recovery?: number } =>
      typeof value === 'number' ? { value } : value,
  )
  .refine((rule) => rule.recovery === undefined || rule.recovery <= rule.value, {
    message: 'recovery must not exceed the threshold value',
  });

export const thresholdsSchema = z.object({
  cpu: thresholdSchema.default(DEFAULT_THRESHOLDS.cpu),
  memory: thresholdSchema.default(DEFAULT_THRESHOLDS.memory),
  disk: thresholdSchema.default(DEFAULT_THRESHOLDS.disk),
  swap: thresholdSchema.default(DEFAULT_THRESHOLDS.swap),
});

export const channelNameSchema = z.enum(['log', 'slack', 'email', 'webhook']);

export const alertsSchema = z
  .object({
    cooldown_minutes: z.number().nonnegative().default(DEFAULT_COOLDOWN_MINUTES),
    channels: z
      .array(channelNameSchema)
      .default(['log'])
      .transform((channels) => Array.from(new Set(channels))),
    notify_recovery: z.boolean().default(false),
    channel_retries: z.number().int().min(1).max(5).default(DEFAULT_CHANNEL_RETRIES),
    history_size: z.number().int().positive().default(DEFAULT_HISTORY_SIZE),
    slack: z
      .object({
        webhook_url: z.string().url(),
        channel: z.string().optional(),
        username: z.string().optional(),
      })
      .optional(),
    email: z
      .object({
        endpoint: z.string().url().optional(),
        from: z.string().min(1),
        to: z.array(z.string().min(1)).min(1),
        subject_prefix: z.string().default('[hostpulse]'),
      })
      .optional(),
    webhook: z
      .object({
        url: z.string().url(),
        headers: z.record(z.string()).default({}),
      })
      .optional(),
  })
  .superRefine((alerts, ctx) => {
    for (const channel of ['slack', 'email', 'webhook'] as const) {
      if (alerts.channels.includes(channel) && !alerts[channel]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [channel],
          message: `the "${channel}" channel is enabled but alerts.${channel} is not configured`,
        });
      }
    }
  });

export const storageSchema = z
  .object({
    backend: z.enum(['sqlite', 'influxdb']),
    sqlite: z
      .object({
        path: z.string().min(1).default(HOSTPULSE_DB_FILE),
      })
      .default({}),
    influxdb: z
      .object({
        url: z.string().url(),
        token: z.string().min(1),
        org: z.string().min(1),
        bucket: z.string().min(1).default(DEFAULT_INFLUXDB_BUCKET),
        timeout: durationSchema.default(DEFAULT_ENDPOINT_TIMEOUT_SECONDS),
      })
      .optional(),
  })
  .superRefine((storage, ctx) => {
    if (storage.backend === 'influxdb' && !storage.influxdb) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['influxdb'],
        message: 'storage.backend is "influxdb" but storage.influxdb is not configured',
      });
    }
  });

export const serverSchema = z.object({
  host: z.string().min(1).default(DEFAULT_SERVER_HOST),
  port: z.number().int().min(0).max(65535).default(DEFAULT_SERVER_PORT),
});

export const collectorConfigSchema = z.object({
  hostname: z.string().min(1).optional(),
  interval_seconds: z.number().int().min(1).default(DEFAULT_INTERVAL_SECONDS),
  endpoint: endpointSchema,
  shutdown_grace: durationSchema.default(DEFAULT_SHUTDOWN_GRACE_SECONDS),
  log_level: logLevelSchema.optional(),
});

export const ingestionConfigSchema = z.object({
  thresholds: thresholdsSchema.default({}),
  alerts: alertsSchema.default({}),
  storage: storageSchema,
  server: serverSchema.default({}),
  shutdown_grace: durationSchema.default(DEFAULT_SHUTDOWN_GRACE_SECONDS),
  log_level: logLevelSchema.optional(),
});

export type CollectorConfig = z.infer<typeof collectorConfigSchema>;
export type IngestionConfig = z.infer<typeof ingestionConfigSchema>;
export type EndpointConfig = z.infer<typeof endpointSchema>;
export type ThresholdsConfig = z.infer<typeof thresholdsSchema>;
export type AlertsConfig = z.infer<typeof alertsSchema>;
export type StorageConfig = z.infer<typeof storageSchema>;
