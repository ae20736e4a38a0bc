/**
 * Faults a message sender raises while talking to the broker.
 *
 * Sender implementations translate their client library's failures into these
 * kinds so the retry policies can classify them without knowing the client.
 */

import { BrokerLinkError, type BrokerLinkErrorOptions } from './types.js';

export abstract class TransportFault extends BrokerLinkError {}

/** The operation did not complete within its allotted time */
export class OperationTimeoutError extends TransportFault {
  constructor(message = 'The operation timed out', options?: BrokerLinkErrorOptions) {
    super(message, 'OPERATION_TIMEOUT', options);
  }
}

/** The broker rejected the request because it is busy */
export class ServerBusyError extends TransportFault {
  constructor(message = 'The server is busy', options?: BrokerLinkErrorOptions) {
    super(message, 'SERVER_BUSY', options);
  }
}

export class ServerTooBusyError extends TransportFault {
  constructor(message = 'The server is too busy to accept the request', options?: BrokerLinkErrorOptions) {
    super(message, 'SERVER_TOO_BUSY', options);
  }
}

/** Messaging-layer communication failure, usually a throttled channel */
export class MessagingCommunicationError extends TransportFault {
  constructor(message = 'Messaging communication failed', options?: BrokerLinkErrorOptions) {
    super(message, 'MESSAGING_COMMUNICATION', options);
  }
}

export class CommunicationError extends TransportFault {
  constructor(message = 'Communication with the endpoint failed', options?: BrokerLinkErrorOptions) {
    super(message, 'COMMUNICATION', options);
  }
}

export class ProtocolError extends TransportFault {
  constructor(message = 'Protocol violation', options?: BrokerLinkErrorOptions) {
    super(message, 'PROTOCOL', options);
  }
}

export type SocketErrorCode =
  | 'TimedOut'
  | 'ConnectionReset'
  | 'ConnectionRefused'
  | 'ConnectionAborted'
  | 'HostNotFound'
  | 'NetworkUnreachable';

export class SocketError extends TransportFault {
  constructor(
    public readonly socketErrorCode: SocketErrorCode,
    message = `Socket error: ${socketErrorCode}`,
    options?: BrokerLinkErrorOptions
  ) {
    super(message, 'SOCKET', options);
  }
}

/**
 * Access denied. The broker client also reports name resolution failures and
 * some internal broker errors this way, with the detail only in the message.
 */
export class UnauthorizedAccessError extends TransportFault {
  constructor(message = 'Access denied', options?: BrokerLinkErrorOptions) {
    super(message, 'UNAUTHORIZED_ACCESS', options);
  }
}

/** Internal broker error */
export class ServerError extends TransportFault {
  constructor(message = 'The server encountered an internal error', options?: BrokerLinkErrorOptions) {
    super(message, 'SERVER_ERROR', options);
  }
}

/** No listener at the endpoint, e.g. while the entity is still being created */
export class EndpointNotFoundError extends TransportFault {
  constructor(message = 'The endpoint was not found', options?: BrokerLinkErrorOptions) {
    super(message, 'ENDPOINT_NOT_FOUND', options);
  }
}
