import { z } from 'zod';
import { MAX_CLOCK_SKEW_MS } from '../constants.js';
import type { MetricSnapshot } from '../types/metrics.js';

const percent = z.number().min(0).max(100);
const counter = z.number().int().nonnegative();

const timestampSchema = z
  .union([z.string().datetime({ offset: true }), counter, z.date()])
  .transform((value) => new Date(value))
  .refine((date) => !Number.isNaN(date.getTime()), { message: 'Invalid timestamp' })
  // A future timestamp would hold back every later observation of its alert keys
  .refine(
    (date) => Number.isNaN(date.getTime()) || date.getTime() - Date.now() <= MAX_CLOCK_SKEW_MS,
    {
      message: `Timestamp is more than ${MAX_CLOCK_SKEW_MS / 60_000} minutes ahead of the server clock`,
    },
  );

export const cpuSchema = z.object({
  overall_percent: percent,
  per_core_percent: z.array(percent),
  load_avg_1_5_15: z.tuple([
    z.number().nonnegative(),
    z.number().nonnegative(),
    z.number().nonnegative(),
  ]),
  core_count_physical: counter.optional(),
  core_count_logical: counter.optional(),
});

export const memorySchema = z.object({
  total_bytes: counter,
  used_bytes: counter,
  free_bytes: counter,
  available_bytes: counter,
  percent_used: percent,
});

export const swapSchema = z.object({
  total_bytes: counter,
  used_bytes: counter,
  free_bytes: counter,
  percent_used: percent,
});

export const filesystemSchema = z.object({
  mount_point: z.string().min(1),
  device: z.string().optional(),
  fs_type: z.string().optional(),
  total_bytes: counter,
  used_bytes: counter,
  free_bytes: counter,
  percent_used: percent,
});

export const diskSchema = z.object({
  filesystems: z.array(filesystemSchema),
  io: z
    .object({
      read_count: counter,
      write_count: counter,
      read_bytes: counter,
      write_bytes: counter,
    })
    .optional(),
});

export const networkSchema = z.object({
  bytes_sent: counter,
  bytes_recv: counter,
  errors_in: counter,
  errors_out: counter,
  drops_in: counter.optional(),
  drops_out: counter.optional(),
});

export const metricSnapshotSchema = z
  .object({
    hostname: z.string().trim().min(1),
    timestamp: timestampSchema,
    collection_duration_ms: z.number().nonnegative().optional(),
    cpu: cpuSchema,
    memory: memorySchema,
    swap: swapSchema.optional(),
    disk: diskSchema,
    network: networkSchema,
  })
  .superRefine((snapshot, ctx) => {
    const checkCapacity = (
      group: { total_bytes: number; used_bytes: number; free_bytes: number },
      path: (string | number)[],
    ) => {
      if (group.used_bytes + group.free_bytes > group.total_bytes) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path,
          message: 'used_bytes + free_bytes exceeds total_bytes',
        });
      }
    };

    checkCapacity(snapshot.memory, ['memory']);
    if (snapshot.swap) checkCapacity(snapshot.swap, ['swap']);

    const seen = new Set<string>();
    snapshot.disk.filesystems.forEach((fs, index) => {
      checkCapacity(fs, ['disk', 'filesystems', index]);
      if (seen.has(fs.mount_point)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['disk', 'filesystems', index, 'mount_point'],
          message: `duplicate mount point "${fs.mount_point}"`,
        });
      }
      seen.add(fs.mount_point);
    });
  });

export const ingestPayloadSchema = z
  .object({
    hostname: z.string().trim().min(1),
    metrics: metricSnapshotSchema,
  })
  .superRefine((payload, ctx) => {
    if (payload.hostname !== payload.metrics.hostname) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['metrics', 'hostname'],
        message: `does not match envelope hostname "${payload.hostname}"`,
      });
    }
  });

export type ValidatedIngestPayload = z.infer<typeof ingestPayloadSchema>;

/** Flatten zod issues into `path: message` lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

/** Deep-freeze a validated snapshot so downstream stages cannot mutate it. */
export function freezeSnapshot(snapshot: MetricSnapshot): MetricSnapshot {
  Object.freeze(snapshot.cpu.per_core_percent);
  Object.freeze(snapshot.cpu.load_avg_1_5_15);
  Object.freeze(snapshot.cpu);
  Object.freeze(snapshot.memory);
  if (snapshot.swap) Object.freeze(snapshot.swap);
  snapshot.disk.filesystems.forEach((fs) => Object.freeze(fs));
  Object.freeze(snapshot.disk.filesystems);
  if (snapshot.disk.io) Object.freeze(snapshot.disk.io);
  Object.freeze(snapshot.disk);
  Object.freeze(snapshot.network);
  return Object.freeze(snapshot);
}
