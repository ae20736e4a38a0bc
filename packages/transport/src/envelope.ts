/**
 * Envelope and per-attempt wire messages
 */

import { randomUUID } from 'crypto';

import { ObjectDisposedError } from '@brokerlink/errors';

import type { MessageSerializer, SendContext } from './types.js';

/** Wire property recording how many attempts preceded this one */
export const BUSY_RETRIES_PROPERTY = 'busy-retries';

export type WirePropertyValue = string | number | boolean;

const presentOrUndefined = (value: string | undefined): string | undefined =>
  value !== undefined && value.trim() !== '' ? value : undefined;

/**
 * Serialized body plus identity metadata, produced once per logical send and
 * shared read-only by every physical attempt
 */
export class MessageEnvelope {
  private constructor(
    public readonly body: Uint8Array,
    public readonly correlationId: string | undefined,
    public readonly messageId: string | undefined,
    public readonly contentType: string | undefined
  ) {
    Object.freeze(this);
  }

  /**
   * Copies `body`, so later changes to the caller's buffer are not sent.
   * Blank identifiers are treated as absent.
   */
  static create(
    body: Uint8Array,
    metadata: { correlationId?: string; messageId?: string; contentType?: string } = {}
  ): MessageEnvelope {
    return new MessageEnvelope(
      Uint8Array.from(body),
      presentOrUndefined(metadata.correlationId),
      presentOrUndefined(metadata.messageId),
      metadata.contentType
    );
  }

  static fromContext<T>(context: SendContext<T>, serializer: MessageSerializer<T>): MessageEnvelope {
    return MessageEnvelope.create(serializer.serialize(context), {
      correlationId: context.correlationId,
      messageId: context.messageId,
      contentType: serializer.contentType,
    });
  }
}

/**
 * The object handed to the message sender for exactly one physical attempt.
 * It must be disposed once that attempt's outcome is known.
 */
export class WireMessage {
  private readonly properties = new Map<string, WirePropertyValue>();
  private disposed = false;

  constructor(
    private readonly payload: Uint8Array,
    public readonly messageId: string,
    public readonly correlationId: string | undefined,
    public readonly contentType: string | undefined
  ) {}

  get body(): Uint8Array {
    this.assertNotDisposed();
    return this.payload;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  getProperty(name: string): WirePropertyValue | undefined {
    return this.properties.get(name);
  }

  setProperty(name: string, value: WirePropertyValue): void {
    this.assertNotDisposed();
    this.properties.set(name, value);
  }

  getProperties(): ReadonlyMap<string, WirePropertyValue> {
    return new Map(this.properties);
  }

  get busyRetries(): number {
    const value = this.properties.get(BUSY_RETRIES_PROPERTY);
    return typeof value === 'number' ? value : 0;
  }

  dispose(): void {
    this.disposed = true;
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new ObjectDisposedError(`WireMessage(${this.messageId})`);
    }
  }
}

export interface EnvelopeBuilderOptions {
  /** Source of ids for envelopes that carry none */
  generateId?: () => string;
}

/**
 * Builds a fresh wire message for each physical attempt
 */
export class EnvelopeBuilder {
  private readonly generateId: () => string;

  constructor(options: EnvelopeBuilderOptions = {}) {
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Message for the 1-based `attempt`; the first attempt records 0 busy retries.
   * The body is copied, so a sender that writes into it cannot alter later
   * attempts. Without a message id on the envelope every attempt gets a new
   * one, as the broker client would assign.
   */
  build(envelope: MessageEnvelope, attempt: number): WireMessage {
    if (!Number.isInteger(attempt) || attempt < 1) {
      throw new Error(`attempt must be a positive integer, got ${attempt}`);
    }

    const message = new WireMessage(
      Uint8Array.from(envelope.body),
      envelope.messageId ?? this.generateId(),
      envelope.correlationId,
      envelope.contentType
    );
    message.setProperty(BUSY_RETRIES_PROPERTY, attempt - 1);
    return message;
  }
}
