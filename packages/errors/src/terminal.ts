/**
 * Errors that end a logical send
 */

import { BrokerLinkError } from './types.js';

export class SendCancelledError extends BrokerLinkError {
  constructor(reason?: unknown) {
    super('The send was cancelled', 'SEND_CANCELLED', { cause: reason });
  }
}

export class TransportDisposedError extends BrokerLinkError {
  constructor(address: string) {
    super(`The outbound transport for '${address}' has been disposed`, 'TRANSPORT_DISPOSED', {
      data: { address },
    });
  }
}

/** A wire message was used after it was disposed */
export class ObjectDisposedError extends BrokerLinkError {
  constructor(objectName: string) {
    super(`Cannot access a disposed object: ${objectName}`, 'OBJECT_DISPOSED', {
      data: { objectName },
    });
  }
}
