import type { FastifyInstance } from 'fastify';
import type { IngestionService } from '../../service/IngestionService.js';

export function registerHealthRoutes(app: FastifyInstance, service: IngestionService): void {
  app.get('/health', async (_request, reply) => {
    const health = await service.health();
    return reply.code(health.status === 'ok' ? 200 : 503).send(health);
  });
}
