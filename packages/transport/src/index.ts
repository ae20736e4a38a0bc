/**
 * Transport module - throttled, retried outbound sends to a broker endpoint
 */

export {
  OutboundTransport,
  createOutboundTransport,
  type OutboundTransportOptions,
  type CreateOutboundTransportOptions,
} from './outbound-transport.js';

export { InFlightThrottle, ThrottleSlot } from './throttle.js';

export {
  BUSY_RETRIES_PROPERTY,
  EnvelopeBuilder,
  MessageEnvelope,
  WireMessage,
  type EnvelopeBuilderOptions,
  type WirePropertyValue,
} from './envelope.js';

export { JsonMessageSerializer } from './serializer.js';
export { LoggingSendObserver } from './observer.js';

export type {
  SendContext,
  MessageSerializer,
  EndpointAddress,
  MessageSender,
  Connection,
  ConnectionHandler,
  SendEvent,
  RetryScheduledSendEvent,
  SendObserver,
  SendOptions,
  TransportStats,
} from './types.js';
