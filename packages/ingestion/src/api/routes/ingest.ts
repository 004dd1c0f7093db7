import type { FastifyInstance } from 'fastify';
import { ServiceUnavailableError, StorageError } from '@hostpulse/shared';
import type { IngestionService } from '../../service/IngestionService.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function registerIngestRoutes(app: FastifyInstance, service: IngestionService): void {
  app.post<{ Body: unknown }>('/ingest', async (request, reply) => {
    const body = isRecord(request.body) ? request.body : {};

    try {
      const result = await service.ingest(body.hostname, body.metrics);
      if (result.status === 'rejected') {
        return reply.code(400).send(result);
      }
      return reply.code(202).send(result);
    } catch (err) {
      // Unacknowledged: the collector retries on 503.
      if (err instanceof ServiceUnavailableError || err instanceof StorageError) {
        return reply.code(503).send({ status: 'error', reason: err.message });
      }
      throw err;
    }
  });
}
