/**
 * The transient-fault policy chain used by the outbound transport.
 *
 * Precedence is overload, then network, then broker: a fault that could belong
 * to more than one family (a timeout may be load or network) is treated as
 * overload and backed off exponentially.
 */

import {
  CommunicationError,
  EndpointNotFoundError,
  FaultCategory,
  MessagingCommunicationError,
  OperationTimeoutError,
  ProtocolError,
  ServerBusyError,
  ServerError,
  ServerTooBusyError,
  SocketError,
  UnauthorizedAccessError,
} from '@brokerlink/errors';
import { RetryPolicySettingsSchema, type RetryPolicySettings } from '@brokerlink/configuration';

import { exponentialCappedBackoff, fixedBackoff } from './backoff.js';
import { Classifiers } from './classifier.js';
import { composePolicies, createRetryPolicy } from './policy.js';
import type { FaultClassifier, RetryPolicy } from './types.js';

export const NAME_RESOLUTION_FAILURE = 'The remote name could not be resolved';
export const BROKER_INTERNAL_FAILURE = 'Error:Code:500:SubCode:T9002';

export const OVERLOAD_CLASSIFIERS: readonly FaultClassifier[] = [
  Classifiers.ofType(OperationTimeoutError),
  Classifiers.ofType(ServerBusyError),
  Classifiers.ofType(MessagingCommunicationError),
  Classifiers.ofType(ServerTooBusyError),
];

export const NETWORK_CLASSIFIERS: readonly FaultClassifier[] = [
  Classifiers.ofType(CommunicationError),
  Classifiers.any(
    Classifiers.ofType(SocketError, fault => fault.socketErrorCode === 'TimedOut', 'SocketError(TimedOut)'),
    Classifiers.withCode('ETIMEDOUT')
  ),
  Classifiers.ofType(ProtocolError),
  Classifiers.any(
    Classifiers.messageContains(UnauthorizedAccessError, NAME_RESOLUTION_FAILURE),
    Classifiers.withCode('ENOTFOUND', 'EAI_AGAIN')
  ),
];

export const BROKER_CLASSIFIERS: readonly FaultClassifier[] = [
  Classifiers.ofType(ServerError),
  Classifiers.ofType(EndpointNotFoundError),
  Classifiers.messageContains(UnauthorizedAccessError, BROKER_INTERNAL_FAILURE),
];

/**
 * Individual policies in precedence order, one per recognized fault kind
 */
export function transientFaultPolicies(
  settings: RetryPolicySettings = RetryPolicySettingsSchema.parse({})
): RetryPolicy[] {
  const { overloaded, network, broker } = settings;

  const overloadBackoff = exponentialCappedBackoff({
    base: overloaded.base,
    exponentFactor: overloaded.exponent_factor,
    cutoff: overloaded.cutoff,
  });
  const networkBackoff = fixedBackoff(network.delay);
  const brokerBackoff = fixedBackoff(broker.delay);

  return [
    ...OVERLOAD_CLASSIFIERS.map(classifier =>
      createRetryPolicy({
        category: FaultCategory.OVERLOADED,
        classifier,
        maxAttempts: overloaded.max_attempts,
        backoff: overloadBackoff,
      })
    ),
    ...NETWORK_CLASSIFIERS.map(classifier =>
      createRetryPolicy({
        category: FaultCategory.NETWORK_FAULT,
        classifier,
        maxAttempts: network.max_attempts,
        backoff: networkBackoff,
      })
    ),
    ...BROKER_CLASSIFIERS.map(classifier =>
      createRetryPolicy({
        category: FaultCategory.BROKER_FAULT,
        classifier,
        maxAttempts: broker.max_attempts,
        backoff: brokerBackoff,
      })
    ),
  ];
}

/**
 * The composed chain: overload, network, broker, then never-retry
 */
export function createTransientFaultPolicy(settings?: RetryPolicySettings): RetryPolicy {
  return composePolicies(transientFaultPolicies(settings));
}
