import { extractErrorInfo } from '@brokerlink/errors';
import type { Logger } from '@brokerlink/logging';

import type { RetryScheduledSendEvent, SendEvent, SendObserver } from './types.js';

/**
 * Writes send activity to a logger. Retries are warnings: they mean the
 * broker is being taxed.
 */
export class LoggingSendObserver implements SendObserver {
  constructor(private readonly logger: Logger) {}

  beginSend(event: SendEvent): void {
    this.logger.debug(`SEND begin:${event.address}:${event.messageId}`, {
      attempt: event.attempt,
      inFlight: event.inFlight,
    });
  }

  endSend(event: SendEvent): void {
    this.logger.debug(`SEND end:${event.address}:${event.messageId}`, {
      attempt: event.attempt,
    });
  }

  retryScheduled(event: RetryScheduledSendEvent): void {
    this.logger.warn(
      `SEND retry:${event.address}:${event.messageId}. Messages in flight: ${event.inFlight}. Messages sleeping: ${event.sleeping}`,
      {
        attempt: event.attempt,
        category: event.category,
        delayMs: event.delayMs,
        fault: extractErrorInfo(event.fault),
      }
    );
  }
}
