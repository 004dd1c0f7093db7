import {
  ServiceUnavailableError,
  StorageError,
  ValidationError,
  formatIssues,
  freezeSnapshot,
  getLogger,
  ingestPayloadSchema,
  withTimeout,
} from '@hostpulse/shared';
import type {
  AlertEvent,
  IngestResult,
  Logger,
  MetricSnapshot,
  QueryFilter,
} from '@hostpulse/shared';
import type { StorageAdapter } from '../storage/StorageAdapter.js';
import type { AlertEngine } from '../alerts/AlertEngine.js';
import type { AlertDispatcher } from '../alerts/AlertDispatcher.js';
import type { AlertHistory } from '../alerts/AlertHistory.js';
import type { EventBus } from '../events/EventBus.js';

export interface IngestionServiceOptions {
  storage: StorageAdapter;
  engine: AlertEngine;
  dispatcher: AlertDispatcher;
  history?: AlertHistory;
  eventBus?: EventBus;
  logger?: Logger;
}

export type HealthStatus = { status: 'ok' } | { status: 'unavailable'; reason: string };

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Validates incoming snapshots and hands accepted ones to alerting and
 * storage. Alerts are evaluated before the storage write is awaited, and
 * notification dispatch is never awaited by `ingest`.
 */
export class IngestionService {
  private storage: StorageAdapter;
  private engine: AlertEngine;
  private dispatcher: AlertDispatcher;
  private history: AlertHistory | null;
  private eventBus: EventBus | null;
  private logger: Logger;
  private inFlight: Set<Promise<void>> = new Set();
  private accepting: boolean = true;

  constructor(options: IngestionServiceOptions) {
    this.storage = options.storage;
    this.engine = options.engine;
    this.dispatcher = options.dispatcher;
    this.history = options.history ?? null;
    this.eventBus = options.eventBus ?? null;
    this.logger = options.logger ?? getLogger().child({ component: 'ingestion' });
  }

  /**
   * Accept or reject one snapshot. Throws ServiceUnavailableError while
   * shutting down and StorageError when the write fails; in both cases the
   * snapshot is not acknowledged.
   */
  async ingest(hostname: unknown, metrics: unknown): Promise<IngestResult> {
    if (!this.accepting) {
      throw new ServiceUnavailableError();
    }

    const parsed = ingestPayloadSchema.safeParse({ hostname, metrics });
    if (!parsed.success) {
      const error = new ValidationError(formatIssues(parsed.error));
      const host = typeof hostname === 'string' ? hostname : undefined;
      this.logger.warn({ hostname: host, reason: error.reason }, 'Snapshot rejected');
      this.eventBus?.emit('snapshot:rejected', { hostname: host, reason: error.reason });
      return { status: 'rejected', reason: error.reason };
    }

    const snapshot = freezeSnapshot(parsed.data.metrics);

    for (const event of this.engine.evaluate(snapshot)) {
      this.publish(event);
    }

    await this.persist(snapshot);

    this.logger.debug(
      { hostname: snapshot.hostname, timestamp: snapshot.timestamp.toISOString() },
      'Snapshot accepted',
    );
    this.eventBus?.emit('snapshot:accepted', {
      hostname: snapshot.hostname,
      timestamp: snapshot.timestamp,
    });
    return { status: 'accepted' };
  }

  async query(filter?: QueryFilter): Promise<MetricSnapshot[]> {
    try {
      return await this.storage.query(filter);
    } catch (err) {
      if (err instanceof StorageError) throw err;
      throw new StorageError(this.storage.backend, `Query failed: ${describe(err)}`, err);
    }
  }

  async health(): Promise<HealthStatus> {
    if (!this.accepting) {
      return { status: 'unavailable', reason: 'shutting down' };
    }
    try {
      await this.storage.ping();
      return { status: 'ok' };
    } catch (err) {
      return { status: 'unavailable', reason: describe(err) };
    }
  }

  getAlerts(limit?: number): AlertEvent[] {
    return this.history?.list(limit) ?? [];
  }

  isAccepting(): boolean {
    return this.accepting;
  }

  getInFlightCount(): number {
    return this.inFlight.size;
  }

  /** Refuse further ingests. In-flight writes continue. */
  stopAccepting(): void {
    this.accepting = false;
  }

  /** Wait up to `timeoutMs` for in-flight writes. Resolves false on timeout. */
  async drain(timeoutMs: number): Promise<boolean> {
    if (this.inFlight.size === 0) return true;

    const pending = this.inFlight.size;
    const drained = await withTimeout(
      Promise.allSettled(Array.from(this.inFlight)).then(() => true),
      timeoutMs,
      false,
    );
    if (!drained) {
      this.logger.warn(
        { pending, remaining: this.inFlight.size, timeoutMs },
        'In-flight writes did not finish before the grace period elapsed',
      );
    }
    return drained;
  }

  private publish(event: AlertEvent): void {
    this.history?.add(event);
    this.eventBus?.emit(event.kind === 'firing' ? 'alert:fired' : 'alert:recovered', event);
    void this.dispatcher.dispatch(event);
  }

  private async persist(snapshot: MetricSnapshot): Promise<void> {
    const write = this.storage.write(snapshot);
    this.inFlight.add(write);

    try {
      await write;
    } catch (err) {
      const error =
        err instanceof StorageError
          ? err
          : new StorageError(this.storage.backend, `Write failed: ${describe(err)}`, err);
      this.logger.error(
        { err: error, hostname: snapshot.hostname, timestamp: snapshot.timestamp.toISOString() },
        'Failed to store snapshot',
      );
      throw error;
    } finally {
      this.inFlight.delete(write);
    }
  }
}
