import { ChannelError, DEFAULT_CHANNEL_RETRY_DELAY, delay, getLogger } from '@hostpulse/shared';
import type { AlertEvent, Logger } from '@hostpulse/shared';
import type { NotificationChannel } from './channels/NotificationChannel.js';

export interface AlertDispatcherOptions {
  channels: NotificationChannel[];
  /** Attempts per channel. */
  retries: number;
  retryDelay?: number;
  notifyRecovery?: boolean;
  logger?: Logger;
}

export interface DispatchStats {
  dispatched: number;
  delivered: number;
  failed: number;
  skipped: number;
}

/**
 * Fans each alert out to every channel concurrently. A failing channel
 * never blocks or fails the others, and `dispatch` never rejects.
 */
export class AlertDispatcher {
  private channels: NotificationChannel[];
  private retries: number;
  private retryDelay: number;
  private notifyRecovery: boolean;
  private logger: Logger;
  private pending: Set<Promise<void>> = new Set();
  private stats: DispatchStats = { dispatched: 0, delivered: 0, failed: 0, skipped: 0 };

  constructor(options: AlertDispatcherOptions) {
    if (!Number.isInteger(options.retries) || options.retries < 1) {
      throw new RangeError(`channel retries must be a positive integer, got ${options.retries}`);
    }
    this.channels = options.channels;
    this.retries = options.retries;
    this.retryDelay = options.retryDelay ?? DEFAULT_CHANNEL_RETRY_DELAY;
    this.notifyRecovery = options.notifyRecovery ?? false;
    this.logger = options.logger ?? getLogger().child({ component: 'alert-dispatcher' });
  }

  dispatch(event: AlertEvent): Promise<void> {
    if (event.kind === 'recovered' && !this.notifyRecovery) {
      this.stats.skipped++;
      return Promise.resolve();
    }

    this.stats.dispatched++;
    const task = Promise.allSettled(
      this.channels.map((channel) => this.sendWithRetry(channel, event)),
    ).then(() => undefined);

    this.pending.add(task);
    void task.finally(() => this.pending.delete(task));
    return task;
  }

  /** Resolve once every dispatch started so far has finished. */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled(Array.from(this.pending));
    }
  }

  getChannelNames(): string[] {
    return this.channels.map((channel) => channel.name);
  }

  getStats(): DispatchStats {
    return { ...this.stats };
  }

  private async sendWithRetry(channel: NotificationChannel, event: AlertEvent): Promise<void> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      try {
        await channel.send(event);
        this.stats.delivered++;
        this.logger.debug({ channel: channel.name, alertId: event.id, attempt }, 'Alert notification sent');
        return;
      } catch (err) {
        lastError = err;
        if (attempt < this.retries) {
          await delay(this.retryDelay);
        }
      }
    }

    this.stats.failed++;
    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    const error = new ChannelError(channel.name, detail, lastError);
    this.logger.error(
      { err: error, channel: channel.name, alertId: event.id, attempts: this.retries },
      'Alert notification failed',
    );
  }
}
