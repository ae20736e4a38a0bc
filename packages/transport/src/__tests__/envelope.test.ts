/**
 * Tests for envelopes, per-attempt wire messages and JSON serialization
 */

import { ObjectDisposedError } from '@brokerlink/errors';
import { describe, it, expect } from 'vitest';

import {
  BUSY_RETRIES_PROPERTY,
  EnvelopeBuilder,
  JsonMessageSerializer,
  MessageEnvelope,
} from '../index.js';

const bytes = (text: string): Uint8Array => Buffer.from(text, 'utf8');
const text = (body: Uint8Array): string => Buffer.from(body).toString('utf8');

describe('MessageEnvelope', () => {
  it('should copy the body it is given', () => {
    const body = bytes('abc');
    const envelope = MessageEnvelope.create(body, { messageId: 'msg-1' });

    body[0] = 0x7a;

    expect(text(envelope.body)).toBe('abc');
    expect(Object.isFrozen(envelope)).toBe(true);
  });

  it('should treat blank identifiers as absent', () => {
    const envelope = MessageEnvelope.create(bytes('x'), { correlationId: '  ', messageId: '' });

    expect(envelope.correlationId).toBeUndefined();
    expect(envelope.messageId).toBeUndefined();
  });

  it('should take the content type from the serializer', () => {
    const envelope = MessageEnvelope.fromContext(
      { message: { orderId: 7 }, correlationId: 'corr-1', messageId: 'msg-1' },
      new JsonMessageSerializer()
    );

    expect(text(envelope.body)).toBe('{"orderId":7}');
    expect(envelope.contentType).toBe('application/json');
    expect(envelope.correlationId).toBe('corr-1');
    expect(envelope.messageId).toBe('msg-1');
  });
});

describe('EnvelopeBuilder', () => {
  const envelope = MessageEnvelope.create(bytes('payload'), {
    correlationId: 'corr-1',
    messageId: 'msg-1',
    contentType: 'text/plain',
  });

  it('should record preceding attempts as busy retries', () => {
    const builder = new EnvelopeBuilder();

    const first = builder.build(envelope, 1);
    const fourth = builder.build(envelope, 4);

    expect(first.getProperty(BUSY_RETRIES_PROPERTY)).toBe(0);
    expect(fourth.busyRetries).toBe(3);
    expect(fourth.getProperties()).toEqual(new Map([['busy-retries', 3]]));
  });

  it('should carry identity and body into every attempt', () => {
    const builder = new EnvelopeBuilder();

    for (const attempt of [1, 2, 3]) {
      const message = builder.build(envelope, attempt);
      expect(message.messageId).toBe('msg-1');
      expect(message.correlationId).toBe('corr-1');
      expect(message.contentType).toBe('text/plain');
      expect(text(message.body)).toBe('payload');
    }
  });

  it('should give each attempt its own copy of the body', () => {
    const builder = new EnvelopeBuilder();
    const first = builder.build(envelope, 1);

    first.body[0] = 0x58;

    expect(text(builder.build(envelope, 2).body)).toBe('payload');
    expect(text(envelope.body)).toBe('payload');
  });

  it('should generate an id per attempt when the envelope has none', () => {
    let next = 0;
    const builder = new EnvelopeBuilder({ generateId: () => `id-${++next}` });
    const anonymous = MessageEnvelope.create(bytes('payload'));

    expect(builder.build(anonymous, 1).messageId).toBe('id-1');
    expect(builder.build(anonymous, 2).messageId).toBe('id-2');
  });

  it('should reject attempt numbers below one', () => {
    const builder = new EnvelopeBuilder();

    expect(() => builder.build(envelope, 0)).toThrow('attempt must be a positive integer, got 0');
  });
});

describe('WireMessage', () => {
  it('should refuse body access and property writes once disposed', () => {
    const message = new EnvelopeBuilder().build(
      MessageEnvelope.create(bytes('payload'), { messageId: 'msg-1' }),
      2
    );

    message.dispose();
    message.dispose();

    expect(message.isDisposed).toBe(true);
    expect(() => message.body).toThrow(ObjectDisposedError);
    expect(() => message.setProperty('k', 'v')).toThrow('Cannot access a disposed object: WireMessage(msg-1)');
    expect(message.busyRetries).toBe(1);
  });
});

describe('JsonMessageSerializer', () => {
  it('should refuse values JSON cannot represent', () => {
    const serializer = new JsonMessageSerializer<unknown>();

    expect(() => serializer.serialize({ message: undefined })).toThrow(TypeError);
  });
});
