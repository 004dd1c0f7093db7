import { hostname as osHostname } from 'node:os';
import { HOSTPULSE_VERSION, getLogger, withTimeout } from '@hostpulse/shared';
import type { CollectorConfig, Logger, MetricSnapshot } from '@hostpulse/shared';
import { Sampler } from './Sampler.js';
import { SnapshotQueue } from './SnapshotQueue.js';
import { TransmissionClient } from './TransmissionClient.js';
import type { CollectorStats } from './types.js';

export interface CollectorAgentDeps {
  sampler?: Sampler;
  client?: TransmissionClient;
  logger?: Logger;
}

/**
 * Wires the sampler to the transmission client through a bounded queue.
 * A single pump delivers one snapshot at a time, so a slow endpoint never
 * delays sampling; it only causes older snapshots to be evicted.
 */
export class CollectorAgent {
  private readonly hostname: string;
  private readonly graceMs: number;
  private readonly sampler: Sampler;
  private readonly client: TransmissionClient;
  private readonly queue: SnapshotQueue;
  private readonly logger: Logger;
  private readonly abortController = new AbortController();
  private pumping: Promise<void> | null = null;
  private started: boolean = false;
  private stopping: boolean = false;

  constructor(config: CollectorConfig, deps: CollectorAgentDeps = {}) {
    this.hostname = config.hostname ?? osHostname();
    this.graceMs = config.shutdown_grace;
    this.logger = deps.logger ?? getLogger().child({ component: 'collector' });
    this.queue = new SnapshotQueue(config.endpoint.queue_depth);
    this.sampler =
      deps.sampler ??
      new Sampler({ hostname: this.hostname, intervalMs: config.interval_seconds * 1000 });
    this.client =
      deps.client ??
      new TransmissionClient({
        url: config.endpoint.url,
        timeout: config.endpoint.timeout,
        maxRetries: config.endpoint.max_retries,
        baseDelay: config.endpoint.base_delay,
        maxDelay: config.endpoint.max_delay,
      });
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.sampler.on('snapshot', this.onSnapshot);
    this.sampler.start();
    this.logger.info({ version: HOSTPULSE_VERSION, hostname: this.hostname }, 'Collector started');
  }

  /**
   * Stop sampling, give the pump up to the grace period to finish, then
   * cancel whatever is still in flight and discard queued snapshots.
   */
  async stop(): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;

    this.sampler.stop();
    this.sampler.off('snapshot', this.onSnapshot);

    const pumping = this.pumping;
    if (pumping) {
      const finished = await withTimeout(
        pumping.then(() => true),
        this.graceMs,
        false,
      );
      if (!finished) {
        this.logger.warn(
          { graceMs: this.graceMs },
          'Shutdown grace period elapsed, cancelling in-flight delivery',
        );
        this.abortController.abort();
        await pumping;
      }
    }

    const discarded = this.queue.clear();
    if (discarded > 0) {
      this.logger.warn({ discarded }, 'Discarding undelivered snapshots');
    }

    this.logger.info({ hostname: this.hostname, ...this.getStats() }, 'Collector stopped');
  }

  getStats(): CollectorStats {
    return { ...this.client.getStats(), dropped: this.queue.dropped };
  }

  getHostname(): string {
    return this.hostname;
  }

  private onSnapshot = (snapshot: MetricSnapshot): void => {
    if (this.stopping) return;

    const evicted = this.queue.push(snapshot);
    if (evicted) {
      this.logger.warn(
        {
          hostname: this.hostname,
          dropped: evicted.timestamp.toISOString(),
          totalDropped: this.queue.dropped,
        },
        'Delivery queue full, dropping oldest snapshot',
      );
    }
    this.pump();
  };

  private pump(): void {
    if (this.pumping) return;

    this.pumping = this.drainQueue().finally(() => {
      this.pumping = null;
      // A snapshot may have arrived between the last shift and this callback.
      if (this.queue.size > 0 && !this.abortController.signal.aborted) {
        this.pump();
      }
    });
  }

  private async drainQueue(): Promise<void> {
    const signal = this.abortController.signal;
    let next = this.queue.shift();

    while (next && !signal.aborted) {
      try {
        await this.client.deliver(next, signal);
      } catch (err) {
        this.logger.error({ err, hostname: this.hostname }, 'Unexpected delivery failure');
      }
      next = this.queue.shift();
    }
  }
}
