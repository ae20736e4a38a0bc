/**
 * Backoff strategies and abortable sleeping
 */

import { SendCancelledError } from '@brokerlink/errors';

import type { BackoffStrategy } from './types.js';

export interface ExponentialCappedOptions {
  /** Growth base, applied per unit of exponent */
  base: number;
  /** Exponent multiplier per attempt */
  exponentFactor: number;
  /** Attempt number past which the delay stops growing */
  cutoff: number;
}

export const DEFAULT_EXPONENTIAL_CAPPED: ExponentialCappedOptions = {
  base: 1.1,
  exponentFactor: 8,
  cutoff: 13,
};

/**
 * `trunc(base ^ (exponentFactor * min(attempt, cutoff)))` milliseconds.
 *
 * With the defaults: attempt 1 waits 2ms, attempt 10 waits 2048ms and every
 * attempt from 13 on waits 20176ms.
 */
export function exponentialCappedBackoff(
  options: ExponentialCappedOptions = DEFAULT_EXPONENTIAL_CAPPED
): BackoffStrategy {
  const { base, exponentFactor, cutoff } = options;
  if (base <= 1) throw new Error('base must be greater than 1');
  if (exponentFactor <= 0) throw new Error('exponentFactor must be positive');
  if (!Number.isInteger(cutoff) || cutoff < 1) throw new Error('cutoff must be a positive integer');

  return Object.freeze({
    kind: 'exponential-capped' as const,
    calculateDelay(attempt: number): number {
      const exponent = exponentFactor * Math.min(Math.max(attempt, 0), cutoff);
      return Math.trunc(Math.pow(base, exponent));
    },
  });
}

export function fixedBackoff(delayMs: number): BackoffStrategy {
  if (!Number.isFinite(delayMs) || delayMs < 0) {
    throw new Error('delayMs must be a non-negative number');
  }

  return Object.freeze({
    kind: 'fixed' as const,
    calculateDelay: (): number => delayMs,
  });
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new SendCancelledError(signal.reason);
  }
}

/**
 * Timer-based wait that rejects with `SendCancelledError` when `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new SendCancelledError(signal.reason));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new SendCancelledError(signal?.reason));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Format delay for logging
 */
export function formatDelay(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  return `${(ms / 60000).toFixed(1)}m`;
}
