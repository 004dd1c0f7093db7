import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { DEFAULT_SERVER_HOST, DEFAULT_SERVER_PORT, getLogger } from '@hostpulse/shared';
import type { Logger } from '@hostpulse/shared';
import type { IngestionService } from '../service/IngestionService.js';
import { registerIngestRoutes } from './routes/ingest.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerMetricRoutes } from './routes/metrics.js';
import { registerAlertRoutes } from './routes/alerts.js';

export interface HTTPServerOptions {
  host?: string;
  port?: number;
  logger?: Logger;
}

export class HTTPServer {
  private app: FastifyInstance;
  private service: IngestionService;
  private port: number;
  private host: string;
  private logger: Logger;
  private ready: boolean = false;

  constructor(service: IngestionService, options: HTTPServerOptions = {}) {
    this.port = options.port ?? DEFAULT_SERVER_PORT;
    this.host = options.host ?? DEFAULT_SERVER_HOST;
    this.logger = options.logger ?? getLogger().child({ component: 'http' });

    this.service = service;
    this.app = Fastify({ logger: false });
  }

  /** Register plugins and routes without listening. `start` calls this too. */
  async prepare(): Promise<FastifyInstance> {
    if (!this.ready) {
      // cors hooks only reach routes registered after it
      await this.app.register(cors, { origin: true });
      this.setupRoutes();
      await this.app.ready();
      this.ready = true;
    }
    return this.app;
  }

  private setupRoutes(): void {
    registerIngestRoutes(this.app, this.service);
    registerHealthRoutes(this.app, this.service);
    registerMetricRoutes(this.app, this.service);
    registerAlertRoutes(this.app, this.service);
  }

  async start(): Promise<void> {
    await this.prepare();
    await this.app.listen({ port: this.port, host: this.host });
    this.logger.info({ address: this.getAddress() }, 'HTTP server listening');
  }

  async stop(): Promise<void> {
    await this.app.close();
  }

  getAddress(): string {
    const address = this.app.server.address();
    const port = address && typeof address === 'object' ? address.port : this.port;
    return `http://${this.host}:${port}`;
  }
}
