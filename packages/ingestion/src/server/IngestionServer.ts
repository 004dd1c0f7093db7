import { HOSTPULSE_VERSION, getLogger, withTimeout } from '@hostpulse/shared';
import type { IngestionConfig, Logger } from '@hostpulse/shared';
import { createStorage } from '../storage/createStorage.js';
import type { StorageAdapter } from '../storage/StorageAdapter.js';
import { AlertEngine, buildAlertPolicy } from '../alerts/AlertEngine.js';
import { AlertDispatcher } from '../alerts/AlertDispatcher.js';
import { AlertHistory } from '../alerts/AlertHistory.js';
import { createChannels } from '../alerts/channels/index.js';
import type { NotificationChannel } from '../alerts/channels/index.js';
import { EventBus } from '../events/EventBus.js';
import { IngestionService } from '../service/IngestionService.js';
import { HTTPServer } from '../api/HTTPServer.js';

const MAINTENANCE_INTERVAL_MS = 60 * 60 * 1000;
const IDLE_STATE_MAX_AGE_MS = 24 * 60 * 60 * 1000;

export interface IngestionServerDeps {
  storage?: StorageAdapter;
  channels?: NotificationChannel[];
  logger?: Logger;
}

/** Boots the ingestion side in dependency order and tears it down in reverse. */
export class IngestionServer {
  private config: IngestionConfig;
  private deps: IngestionServerDeps;
  private logger: Logger;
  private eventBus: EventBus;
  private storage: StorageAdapter | null = null;
  private engine: AlertEngine | null = null;
  private dispatcher: AlertDispatcher | null = null;
  private service: IngestionService | null = null;
  private httpServer: HTTPServer | null = null;
  private maintenanceTimer: NodeJS.Timeout | null = null;
  private running: boolean = false;

  constructor(config: IngestionConfig, deps: IngestionServerDeps = {}) {
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger ?? getLogger().child({ component: 'server' });
    this.eventBus = new EventBus(deps.logger?.child({ component: 'events' }));
  }

  async start(): Promise<void> {
    if (this.running) return;

    this.logger.info(
      { version: HOSTPULSE_VERSION, backend: this.config.storage.backend },
      'Ingestion server starting',
    );

    // 1. Storage must be reachable before anything is accepted
    const storage = this.deps.storage ?? createStorage(this.config.storage);
    try {
      await storage.ping();
    } catch (err) {
      await storage.close();
      throw err;
    }
    this.storage = storage;

    // 2. Alerting
    const { thresholds, alerts } = this.config;
    this.engine = new AlertEngine({ policy: buildAlertPolicy(thresholds, alerts) });
    const channels = this.deps.channels ?? createChannels(alerts);
    this.dispatcher = new AlertDispatcher({
      channels,
      retries: alerts.channel_retries,
      notifyRecovery: alerts.notify_recovery,
    });
    const history = new AlertHistory(alerts.history_size);

    // 3. Service and HTTP
    this.service = new IngestionService({
      storage,
      engine: this.engine,
      dispatcher: this.dispatcher,
      history,
      eventBus: this.eventBus,
    });
    this.httpServer = new HTTPServer(this.service, {
      host: this.config.server.host,
      port: this.config.server.port,
    });
    await this.httpServer.start();

    // 4. Periodic maintenance
    this.startMaintenance();

    this.running = true;
    this.logger.info(
      {
        address: this.httpServer.getAddress(),
        channels: channels.map((channel) => channel.name),
      },
      'Ingestion server started',
    );
  }

  /**
   * Stop accepting, close HTTP, give in-flight writes and notifications the
   * grace period, then close storage.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    const grace = this.config.shutdown_grace;
    this.logger.info({ graceMs: grace }, 'Ingestion server stopping');
    this.eventBus.emit('system:shutdown', undefined);

    if (this.maintenanceTimer) {
      clearInterval(this.maintenanceTimer);
      this.maintenanceTimer = null;
    }

    this.service?.stopAccepting();
    await this.httpServer?.stop();
    await this.service?.drain(grace);

    if (this.dispatcher) {
      const flushed = await withTimeout(
        this.dispatcher.flush().then(() => true),
        grace,
        false,
      );
      if (!flushed) {
        this.logger.warn({ graceMs: grace }, 'Pending alert notifications abandoned');
      }
    }

    await this.storage?.close();
    this.eventBus.removeAllListeners();

    this.logger.info('Ingestion server stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  getEventBus(): EventBus {
    return this.eventBus;
  }

  getService(): IngestionService | null {
    return this.service;
  }

  getAddress(): string | null {
    return this.httpServer?.getAddress() ?? null;
  }

  private startMaintenance(): void {
    const timer = setInterval(() => {
      this.engine?.evictIdle(new Date(Date.now() - IDLE_STATE_MAX_AGE_MS));
    }, MAINTENANCE_INTERVAL_MS);
    timer.unref();
    this.maintenanceTimer = timer;
  }
}
