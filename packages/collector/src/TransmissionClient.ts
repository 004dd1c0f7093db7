import { AbortedError, DeliveryError, delay, formatDuration, getLogger } from '@hostpulse/shared';
import type { Logger, MetricSnapshot } from '@hostpulse/shared';
import { computeBackoff } from './backoff.js';
import type {
  DeliveryAttempt,
  DeliveryResult,
  DeliveryStatus,
  TransmissionOptions,
  TransmissionState,
  TransmissionStats,
} from './types.js';

const MAX_ERROR_DETAIL = 200;

function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

/**
 * Posts snapshots to the ingestion endpoint with bounded retry.
 *
 * Each `deliver()` call walks `idle -> attempting -> (succeeded | backoff ->
 * attempting ... -> exhausted)`. Non-retryable responses end in `rejected`;
 * aborting the signal ends a pending request or backoff sleep in `cancelled`.
 */
export class TransmissionClient {
  private options: TransmissionOptions;
  private logger: Logger;
  private state: TransmissionState = 'idle';
  private stats: TransmissionStats = {
    delivered: 0,
    rejected: 0,
    exhausted: 0,
    cancelled: 0,
    attempts: 0,
  };

  constructor(options: TransmissionOptions) {
    if (options.maxRetries < 1) {
      throw new RangeError(`maxRetries must be at least 1, got ${options.maxRetries}`);
    }
    this.options = options;
    this.logger = options.logger ?? getLogger().child({ component: 'transmission' });
  }

  getState(): TransmissionState {
    return this.state;
  }

  getStats(): TransmissionStats {
    return { ...this.stats };
  }

  async deliver(snapshot: MetricSnapshot, signal?: AbortSignal): Promise<DeliveryResult> {
    const attempt: DeliveryAttempt = {
      snapshot,
      attemptCount: 0,
      nextBackoff: null,
      lastError: null,
    };
    const body = JSON.stringify({ hostname: snapshot.hostname, metrics: snapshot });
    const context = { hostname: snapshot.hostname, timestamp: snapshot.timestamp.toISOString() };

    for (;;) {
      if (signal?.aborted) return this.finish('cancelled', attempt);

      attempt.attemptCount++;
      this.stats.attempts++;
      this.state = 'attempting';

      const error = await this.attemptOnce(body, signal);
      if (error === 'cancelled') return this.finish('cancelled', attempt);
      if (error === null) {
        this.logger.debug({ ...context, attempts: attempt.attemptCount }, 'Snapshot delivered');
        return this.finish('delivered', attempt);
      }

      attempt.lastError = error;
      if (!error.retryable) {
        this.logger.error(
          { ...context, err: error, status: error.status, attempts: attempt.attemptCount },
          'Snapshot rejected by endpoint',
        );
        return this.finish('rejected', attempt);
      }

      if (attempt.attemptCount >= this.options.maxRetries) {
        this.logger.error(
          { ...context, err: error, attempts: attempt.attemptCount },
          'Snapshot delivery failed, dropping snapshot',
        );
        return this.finish('exhausted', attempt);
      }

      attempt.nextBackoff = computeBackoff(
        attempt.attemptCount,
        {
          baseDelay: this.options.baseDelay,
          maxDelay: this.options.maxDelay,
          jitter: this.options.jitter,
        },
        this.options.random,
      );
      this.state = 'backoff';
      this.logger.warn(
        {
          ...context,
          attempt: attempt.attemptCount,
          maxRetries: this.options.maxRetries,
          retryIn: formatDuration(attempt.nextBackoff),
          reason: error.message,
        },
        'Delivery attempt failed, backing off',
      );

      try {
        await delay(attempt.nextBackoff, signal);
      } catch (err) {
        if (err instanceof AbortedError) return this.finish('cancelled', attempt);
        throw err;
      }
    }
  }

  private finish(status: DeliveryStatus, attempt: DeliveryAttempt): DeliveryResult {
    switch (status) {
      case 'delivered':
        this.state = 'succeeded';
        this.stats.delivered++;
        break;
      case 'rejected':
        this.state = 'rejected';
        this.stats.rejected++;
        break;
      case 'exhausted':
        this.state = 'exhausted';
        this.stats.exhausted++;
        break;
      case 'cancelled':
        this.state = 'cancelled';
        this.stats.cancelled++;
        this.logger.info(
          { hostname: attempt.snapshot.hostname, attempts: attempt.attemptCount },
          'Snapshot delivery cancelled',
        );
        break;
    }

    const result: DeliveryResult = { status, attempts: attempt.attemptCount };
    if (status !== 'delivered' && attempt.lastError) {
      result.error = attempt.lastError;
    }
    return result;
  }

  /** Returns null on success, the failure otherwise. */
  private async attemptOnce(
    body: string,
    signal?: AbortSignal,
  ): Promise<DeliveryError | 'cancelled' | null> {
    try {
      await this.post(body, signal);
      return null;
    } catch (err) {
      if (err instanceof AbortedError) return 'cancelled';
      if (err instanceof DeliveryError) return err;
      throw err;
    }
  }

  private async post(body: string, signal?: AbortSignal): Promise<void> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeout);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    // The timeout covers the error body too: a stalled body aborts the read.
    let status: number | undefined;
    try {
      const response = await fetch(this.options.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
        signal: controller.signal,
      });
      if (response.ok) return;

      status = response.status;
      const detail = (await response.text()).slice(0, MAX_ERROR_DETAIL);
      throw new DeliveryError(`Endpoint responded ${status}${detail ? `: ${detail}` : ''}`, {
        status,
        retryable: isRetryableStatus(status),
      });
    } catch (err) {
      if (err instanceof DeliveryError) throw err;
      if (signal?.aborted) throw new AbortedError('Delivery cancelled');
      if (controller.signal.aborted) {
        throw new DeliveryError(`Request timed out after ${this.options.timeout}ms`, {
          status,
          retryable: true,
          cause: err,
        });
      }
      if (status !== undefined) {
        throw new DeliveryError(`Endpoint responded ${status}`, {
          status,
          retryable: isRetryableStatus(status),
          cause: err,
        });
      }
      const message = `Request failed: ${err instanceof Error ? err.message : String(err)}`;
      throw new DeliveryError(message, { retryable: true, cause: err });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
