/**
 * Collaborator interfaces and event types for the outbound transport
 */

import type { FaultCategory } from '@brokerlink/errors';

import type { WireMessage } from './envelope.js';

/**
 * What a caller hands to `send`: the payload plus optional identifiers
 */
export interface SendContext<T = unknown> {
  readonly message: T;
  readonly correlationId?: string;
  readonly messageId?: string;
}

export interface MessageSerializer<T = unknown> {
  readonly contentType: string;
  serialize(context: SendContext<T>): Uint8Array;
}

/**
 * Identity of the broker entity messages are sent to
 */
export interface EndpointAddress {
  readonly uri: string;
  dispose?(): void;
}

/**
 * Wire-level send primitive; must accept one call per physical attempt
 */
export interface MessageSender {
  send(message: WireMessage): Promise<void>;
}

export interface Connection {
  readonly messageSender: MessageSender;
}

/**
 * Owns the connection lifecycle. `use` lends a live connection to `action`
 * and recovers connection-level failures on its own; anything `action`
 * throws is reported back as a send fault.
 */
export interface ConnectionHandler<C extends Connection = Connection> {
  use<R>(action: (connection: C) => Promise<R>): Promise<R>;
  dispose?(): void | Promise<void>;
}

export interface SendEvent {
  readonly address: string;
  readonly messageId: string;
  readonly attempt: number;
  readonly inFlight: number;
  readonly sleeping: number;
}

export interface RetryScheduledSendEvent extends SendEvent {
  readonly category: FaultCategory;
  readonly delayMs: number;
  readonly fault: unknown;
}

/**
 * Observability sink for send activity
 */
export interface SendObserver {
  beginSend(event: SendEvent): void;
  endSend(event: SendEvent): void;
  retryScheduled(event: RetryScheduledSendEvent): void;
}

export interface SendOptions {
  signal?: AbortSignal;
}

export interface TransportStats {
  readonly maxOutstanding: number;
  /** Physical sends holding a throttle slot */
  readonly inFlight: number;
  /** Physical attempts waiting for a throttle slot */
  readonly waiting: number;
  /** Logical sends waiting out a backoff delay */
  readonly sleeping: number;
}
