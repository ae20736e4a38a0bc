/**
 * Retry execution engine driven by a composed retry policy
 */

import { FaultCategory, extractErrorInfo } from '@brokerlink/errors';
import type { Logger } from '@brokerlink/logging';

import { formatDelay, sleep, throwIfAborted } from './backoff.js';
import type { AttemptOperation, ExecuteOptions, RetryPolicy, SleepFunction } from './types.js';

export interface RetryExecutorOptions {
  /** Replaces the timer-based wait, e.g. to count sleepers or in tests */
  sleep?: SleepFunction;
  logger?: Logger;
}

/**
 * Drives one logical operation through its retry policy.
 *
 * The returned promise settles only on a terminal outcome: the operation's
 * result, or the last fault, either because no policy recognizes it or
 * because its category ran out of attempts.
 */
export class RetryExecutor {
  private readonly sleep: SleepFunction;
  private readonly logger: Logger | undefined;

  constructor(
    private readonly policy: RetryPolicy,
    options: RetryExecutorOptions = {}
  ) {
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger;
  }

  async execute<T>(operation: AttemptOperation<T>, options: ExecuteOptions<T> = {}): Promise<T> {
    const { onSuccess, onRetry, signal } = options;

    for (let attempt = 1; ; attempt++) {
      throwIfAborted(signal);

      let result: T;
      try {
        result = await operation(attempt);
      } catch (fault) {
        const category = this.policy.classify(fault);

        if (category === FaultCategory.UNCLASSIFIED) {
          this.logger?.debug('Fault not retryable', { attempt, ...extractErrorInfo(fault) });
          throw fault;
        }

        if (!this.policy.shouldContinue(attempt, fault)) {
          this.logger?.warn('Retries exhausted', { attempts: attempt, category, ...extractErrorInfo(fault) });
          throw fault;
        }

        const delayMs = this.policy.nextDelay(attempt, fault);
        this.logger?.debug(`Retrying in ${formatDelay(delayMs)}`, { attempt, category });
        onRetry?.({ attempt, delayMs, category, fault });

        await this.sleep(delayMs, signal);
        continue;
      }

      onSuccess?.(result, attempt);
      return result;
    }
  }
}

/**
 * Wrap `fn` so every call runs through a fresh execution of `policy`
 */
export function withRetryPolicy<A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  policy: RetryPolicy,
  options: RetryExecutorOptions = {}
): (...args: A) => Promise<R> {
  const executor = new RetryExecutor(policy, options);
  return (...args: A): Promise<R> => executor.execute(() => fn(...args));
}
