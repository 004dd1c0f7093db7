import { DEFAULT_BACKOFF_JITTER } from '@hostpulse/shared';
import type { BackoffOptions } from './types.js';

/**
 * Delay before the attempt following `failedAttempt` (1-based):
 * `min(baseDelay * 2^(failedAttempt - 1), maxDelay)` scaled by a factor drawn
 * from `[1 - jitter, 1 + jitter]`, clamped to `[0, maxDelay]`.
 */
export function computeBackoff(
  failedAttempt: number,
  options: BackoffOptions,
  random: () => number = Math.random,
): number {
  const { baseDelay, maxDelay, jitter = DEFAULT_BACKOFF_JITTER } = options;
  const exponent = Math.max(0, failedAttempt - 1);
  const capped = Math.min(baseDelay * Math.pow(2, exponent), maxDelay);
  const factor = 1 - jitter + random() * 2 * jitter;
  return Math.min(Math.max(0, Math.round(capped * factor)), maxDelay);
}
