import type { DeliveryError, Logger, MetricSnapshot } from '@hostpulse/shared';

export type TransmissionState =
  | 'idle'
  | 'attempting'
  | 'backoff'
  | 'succeeded'
  | 'rejected'
  | 'exhausted'
  | 'cancelled';

export type DeliveryStatus = 'delivered' | 'rejected' | 'exhausted' | 'cancelled';

export interface DeliveryResult {
  status: DeliveryStatus;
  attempts: number;
  error?: DeliveryError;
}

/** Transient bookkeeping for one snapshot moving through the retry loop. */
export interface DeliveryAttempt {
  snapshot: MetricSnapshot;
  attemptCount: number;
  nextBackoff: number | null;
  lastError: DeliveryError | null;
}

export interface TransmissionStats {
  delivered: number;
  rejected: number;
  exhausted: number;
  cancelled: number;
  attempts: number;
}

export interface CollectorStats extends TransmissionStats {
  dropped: number;
}

export interface BackoffOptions {
  baseDelay: number;
  maxDelay: number;
  jitter?: number;
}

export interface TransmissionOptions {
  url: string;
  timeout: number;
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  jitter?: number;
  random?: () => number;
  logger?: Logger;
}

export interface SamplerOptions {
  hostname: string;
  intervalMs: number;
  logger?: Logger;
}
