/**
 * Retry module - fault classification, backoff strategies and composable retry policies
 *
 * Features:
 * - Classifiers over fault kind, message detail and Node error codes
 * - Exponential-capped and fixed backoff strategies
 * - Left-biased policy composition with a never-retry identity
 * - Per-category attempt bounds
 * - Abortable backoff waits
 */

export type {
  FaultClassifier,
  BackoffStrategy,
  RetryPolicy,
  RetryPolicyDefinition,
  RetryScheduledEvent,
  ExecuteOptions,
  AttemptOperation,
  SleepFunction,
} from './types.js';

export { Classifiers } from './classifier.js';

export {
  DEFAULT_EXPONENTIAL_CAPPED,
  exponentialCappedBackoff,
  fixedBackoff,
  sleep,
  throwIfAborted,
  formatDelay,
  type ExponentialCappedOptions,
} from './backoff.js';

export { NEVER_RETRY, createRetryPolicy, combine, composePolicies } from './policy.js';

export {
  OVERLOAD_CLASSIFIERS,
  NETWORK_CLASSIFIERS,
  BROKER_CLASSIFIERS,
  NAME_RESOLUTION_FAILURE,
  BROKER_INTERNAL_FAILURE,
  transientFaultPolicies,
  createTransientFaultPolicy,
} from './fault-policies.js';

export { RetryExecutor, withRetryPolicy, type RetryExecutorOptions } from './executor.js';
