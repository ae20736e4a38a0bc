/**
 * Retry policies and their left-biased composition
 */

import { FaultCategory } from '@brokerlink/errors';

import type { RetryPolicy, RetryPolicyDefinition } from './types.js';

/**
 * Identity for composition: claims nothing, retries nothing
 */
export const NEVER_RETRY: RetryPolicy = Object.freeze({
  matches: (): boolean => false,
  classify: (): FaultCategory => FaultCategory.UNCLASSIFIED,
  shouldContinue: (): boolean => false,
  nextDelay: (): number => 0,
});

/**
 * Leaf policy: one classifier, one attempt bound, one backoff
 */
export function createRetryPolicy(definition: RetryPolicyDefinition): RetryPolicy {
  const { category, classifier, maxAttempts, backoff } = definition;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error(`maxAttempts must be a positive integer (${classifier.description})`);
  }
  if (category === FaultCategory.UNCLASSIFIED) {
    throw new Error('A retry policy cannot be declared for unclassified faults');
  }

  return Object.freeze({
    matches: (fault: unknown): boolean => classifier.matches(fault),
    classify: (fault: unknown): FaultCategory =>
      classifier.matches(fault) ? category : FaultCategory.UNCLASSIFIED,
    shouldContinue: (attempt: number): boolean => attempt < maxAttempts,
    nextDelay: (attempt: number): number => backoff.calculateDelay(attempt),
  });
}

/**
 * `first` decides every fault it matches; everything else goes to `second`
 */
export function combine(first: RetryPolicy, second: RetryPolicy): RetryPolicy {
  const pick = (fault: unknown): RetryPolicy => (first.matches(fault) ? first : second);

  return Object.freeze({
    matches: (fault: unknown): boolean => first.matches(fault) || second.matches(fault),
    classify: (fault: unknown): FaultCategory => pick(fault).classify(fault),
    shouldContinue: (attempt: number, fault: unknown): boolean =>
      pick(fault).shouldContinue(attempt, fault),
    nextDelay: (attempt: number, fault: unknown): number => pick(fault).nextDelay(attempt, fault),
  });
}

/**
 * Fold `policies` onto `NEVER_RETRY`; earlier entries take precedence
 */
export function composePolicies(policies: readonly RetryPolicy[]): RetryPolicy {
  return policies.reduce(combine, NEVER_RETRY);
}
