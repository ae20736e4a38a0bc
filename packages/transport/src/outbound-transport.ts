/**
 * Outbound transport: throttled, retried sends to one broker endpoint
 */

import {
  TransportConfigSchema,
  type SenderSettings,
  type TransportConfig,
} from '@brokerlink/configuration';
import { TransportDisposedError, extractErrorInfo } from '@brokerlink/errors';
import { Logger, LoggerFactory } from '@brokerlink/logging';
import {
  RetryExecutor,
  createTransientFaultPolicy,
  sleep,
  type RetryPolicy,
  type SleepFunction,
} from '@brokerlink/retry';

import { EnvelopeBuilder, MessageEnvelope, type WireMessage } from './envelope.js';
import { LoggingSendObserver } from './observer.js';
import { JsonMessageSerializer } from './serializer.js';
import { InFlightThrottle } from './throttle.js';
import type {
  ConnectionHandler,
  EndpointAddress,
  MessageSerializer,
  SendContext,
  SendEvent,
  SendObserver,
  SendOptions,
  TransportStats,
} from './types.js';

export interface OutboundTransportOptions<T> {
  address: EndpointAddress;
  connectionHandler: ConnectionHandler;
  settings: SenderSettings;
  serializer: MessageSerializer<T>;
  /** Defaults to the transient-fault chain with default settings */
  policy?: RetryPolicy;
  /** Defaults to logging send activity through `logger` */
  observer?: SendObserver;
  logger?: Logger;
  envelopeBuilder?: EnvelopeBuilder;
  /** Backoff wait; replaced in tests */
  sleep?: SleepFunction;
}

/**
 * Sends serialized messages to a broker endpoint.
 *
 * Each physical attempt takes its own throttle slot, gets its own wire
 * message, and gives both back as soon as its outcome is known, before the
 * retry policy decides whether to go again. `send` settles only on success
 * or a terminal fault.
 */
export class OutboundTransport<T = unknown> {
  private readonly connectionHandler: ConnectionHandler;
  private readonly serializer: MessageSerializer<T>;
  private readonly throttle: InFlightThrottle;
  private readonly executor: RetryExecutor;
  private readonly observer: SendObserver;
  private readonly envelopeBuilder: EnvelopeBuilder;
  private readonly logger: Logger;
  private readonly endpoint: EndpointAddress;
  private sleepingCount = 0;
  private disposed = false;

  constructor(options: OutboundTransportOptions<T>) {
    this.endpoint = options.address;
    this.connectionHandler = options.connectionHandler;
    this.serializer = options.serializer;
    this.throttle = new InFlightThrottle(options.settings.max_outstanding);
    this.envelopeBuilder = options.envelopeBuilder ?? new EnvelopeBuilder();
    this.logger = (options.logger ?? LoggerFactory.createConsoleLogger('brokerlink')).child(
      'outbound',
      { address: options.address.uri }
    );
    this.observer = options.observer ?? new LoggingSendObserver(this.logger.child('messages'));

    const wait = options.sleep ?? sleep;
    this.executor = new RetryExecutor(options.policy ?? createTransientFaultPolicy(), {
      logger: this.logger,
      sleep: async (ms, signal) => {
        this.sleepingCount++;
        try {
          await wait(ms, signal);
        } finally {
          this.sleepingCount--;
        }
      },
    });

    this.logger.debug(`created outbound transport for address '${options.address.uri}'`, {
      maxOutstanding: this.throttle.maxOutstanding,
    });
  }

  get address(): EndpointAddress {
    return this.endpoint;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  stats(): TransportStats {
    return {
      maxOutstanding: this.throttle.maxOutstanding,
      inFlight: this.throttle.inFlight,
      waiting: this.throttle.waiting,
      sleeping: this.sleepingCount,
    };
  }

  /**
   * Send one logical message, retrying transient faults per the policy
   */
  async send(context: SendContext<T>, options: SendOptions = {}): Promise<void> {
    if (this.disposed) {
      throw new TransportDisposedError(this.endpoint.uri);
    }

    const envelope = MessageEnvelope.fromContext(context, this.serializer);
    let currentMessageId = envelope.messageId ?? '';

    await this.executor.execute(
      attempt =>
        this.sendAttempt(envelope, attempt, options.signal, messageId => {
          currentMessageId = messageId;
        }),
      {
        signal: options.signal,
        onRetry: ({ attempt, delayMs, category, fault }) => {
          this.notify('retryScheduled', observer =>
            observer.retryScheduled({
              ...this.snapshot(currentMessageId, attempt),
              category,
              delayMs,
              fault,
            })
          );
        },
      }
    );
  }

  /**
   * Dispose the endpoint address and the connection handler; later calls do nothing
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    try {
      this.endpoint.dispose?.();
      await this.connectionHandler.dispose?.();
    } finally {
      this.disposed = true;
      this.logger.debug('disposed outbound transport');
    }
  }

  private async sendAttempt(
    envelope: MessageEnvelope,
    attempt: number,
    signal: AbortSignal | undefined,
    onMessage: (messageId: string) => void
  ): Promise<void> {
    const slot = await this.throttle.acquire(signal);
    let message: WireMessage | undefined;

    try {
      const outgoing = this.envelopeBuilder.build(envelope, attempt);
      message = outgoing;
      onMessage(outgoing.messageId);

      this.notify('beginSend', observer => observer.beginSend(this.snapshot(outgoing.messageId, attempt)));
      await this.connectionHandler.use(connection => connection.messageSender.send(outgoing));
      this.notify('endSend', observer => observer.endSend(this.snapshot(outgoing.messageId, attempt)));
    } finally {
      slot.release();
      message?.dispose();
    }
  }

  /**
   * Observer failures are logged and never change the outcome of a send
   */
  private notify(event: keyof SendObserver, call: (observer: SendObserver) => void): void {
    try {
      call(this.observer);
    } catch (error) {
      this.logger.warn(`Send observer failed on ${event}`, extractErrorInfo(error));
    }
  }

  private snapshot(messageId: string, attempt: number): SendEvent {
    return {
      address: this.endpoint.uri,
      messageId,
      attempt,
      inFlight: this.throttle.inFlight,
      sleeping: this.sleepingCount,
    };
  }
}

export interface CreateOutboundTransportOptions<T> {
  address: EndpointAddress;
  connectionHandler: ConnectionHandler;
  /** Parsed transport configuration; schema defaults when omitted */
  config?: TransportConfig;
  serializer?: MessageSerializer<T>;
  logger?: Logger;
  observer?: SendObserver;
}

/**
 * Wire a transport from validated configuration
 */
export function createOutboundTransport<T = unknown>(
  options: CreateOutboundTransportOptions<T>
): OutboundTransport<T> {
  const config = options.config ?? TransportConfigSchema.parse({});
  const logger =
    options.logger ??
    (config.logging.format === 'json'
      ? LoggerFactory.createStructuredLogger('brokerlink', config.logging.level)
      : LoggerFactory.createConsoleLogger('brokerlink', config.logging.level));

  return new OutboundTransport<T>({
    address: options.address,
    connectionHandler: options.connectionHandler,
    settings: config.sender,
    serializer: options.serializer ?? new JsonMessageSerializer<T>(),
    policy: createTransientFaultPolicy(config.retry),
    logger,
    observer: options.observer,
  });
}
