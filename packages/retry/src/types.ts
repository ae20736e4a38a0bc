/**
 * Retry mechanism types and interfaces
 */

import type { FaultCategory } from '@brokerlink/errors';

/**
 * Recognizes faults by kind and, optionally, by detail
 */
export interface FaultClassifier {
  /** Human-readable description used in logs */
  readonly description: string;
  matches(fault: unknown): boolean;
}

/**
 * Maps a 1-based attempt number to the delay before the next attempt
 */
export interface BackoffStrategy {
  readonly kind: 'exponential-capped' | 'fixed';
  calculateDelay(attempt: number): number;
}

/**
 * Retry decision for one family of faults.
 *
 * `shouldContinue` and `nextDelay` are only meaningful for a fault the policy
 * `matches`; composed policies take care of routing a fault to the right one.
 */
export interface RetryPolicy {
  matches(fault: unknown): boolean;
  /** Category of the policy that claims the fault, or UNCLASSIFIED */
  classify(fault: unknown): FaultCategory;
  /** Whether another attempt may follow the failed `attempt` */
  shouldContinue(attempt: number, fault: unknown): boolean;
  /** Milliseconds to wait after the failed `attempt` */
  nextDelay(attempt: number, fault: unknown): number;
}

export interface RetryPolicyDefinition {
  category: FaultCategory;
  classifier: FaultClassifier;
  /** Total attempts allowed, counting the first */
  maxAttempts: number;
  backoff: BackoffStrategy;
}

export type SleepFunction = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryScheduledEvent {
  /** The attempt that just failed */
  attempt: number;
  delayMs: number;
  category: FaultCategory;
  fault: unknown;
}

export interface ExecuteOptions<T> {
  /** Called once with the result of the successful attempt */
  onSuccess?: (result: T, attempt: number) => void;
  /** Called before each backoff wait */
  onRetry?: (event: RetryScheduledEvent) => void;
  /** Cancels before the next attempt or during a backoff wait */
  signal?: AbortSignal;
}

/**
 * One physical try of a logical operation; receives the 1-based attempt number
 */
export type AttemptOperation<T> = (attempt: number) => Promise<T>;
