import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { MAX_QUERY_LIMIT, StorageError, formatIssues } from '@hostpulse/shared';
import type { IngestionService } from '../../service/IngestionService.js';

/** ISO-8601 string or epoch milliseconds. */
const timeParam = z
  .string()
  .min(1)
  .transform((value, ctx) => {
    const date = /^\d+$/.test(value) ? new Date(Number(value)) : new Date(value);
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid time "${value}"` });
      return z.NEVER;
    }
    return date;
  });

export const metricsQuerySchema = z
  .object({
    host: z.string().min(1).optional(),
    since: timeParam.optional(),
    until: timeParam.optional(),
    limit: z.coerce.number().int().min(1).max(MAX_QUERY_LIMIT).optional(),
  })
  .refine((query) => !query.since || !query.until || query.since <= query.until, {
    message: 'since must not be after until',
    path: ['since'],
  });

export function registerMetricRoutes(app: FastifyInstance, service: IngestionService): void {
  app.get<{ Querystring: Record<string, string | undefined> }>(
    '/metrics',
    async (request, reply) => {
      const parsed = metricsQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.code(400).send({ error: formatIssues(parsed.error).join('; ') });
      }

      try {
        return await service.query(parsed.data);
      } catch (err) {
        if (err instanceof StorageError) {
          return reply.code(503).send({ error: err.message });
        }
        throw err;
      }
    },
  );
}
