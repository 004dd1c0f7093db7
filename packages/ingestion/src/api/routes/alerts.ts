import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { DEFAULT_HISTORY_SIZE, formatIssues } from '@hostpulse/shared';
import { serializeAlertEvent } from '../../alerts/channels/NotificationChannel.js';
import type { IngestionService } from '../../service/IngestionService.js';

export const alertsQuerySchema = z.object({
  limit: z.coerce.number().int().min(0).default(DEFAULT_HISTORY_SIZE),
});

export function registerAlertRoutes(app: FastifyInstance, service: IngestionService): void {
  // Recent alert events, newest last
  app.get<{ Querystring: Record<string, string | undefined> }>('/alerts', async (request, reply) => {
    const parsed = alertsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: formatIssues(parsed.error).join('; ') });
    }
    return service.getAlerts(parsed.data.limit).map(serializeAlertEvent);
  });
}
