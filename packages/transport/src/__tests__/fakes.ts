/**
 * In-process stand-ins for the broker side of the transport
 */

import type { WireMessage } from '../envelope.js';
import type {
  Connection,
  ConnectionHandler,
  EndpointAddress,
  MessageSender,
  RetryScheduledSendEvent,
  SendEvent,
  SendObserver,
} from '../types.js';

export interface SentRecord {
  messageId: string;
  correlationId: string | undefined;
  contentType: string | undefined;
  busyRetries: number;
  body: string;
}

/** Decides the outcome of the `call`-th send; throw to fail it */
export type SendScript = (message: WireMessage, call: number) => Promise<void> | void;

export class FakeMessageSender implements MessageSender {
  readonly sent: SentRecord[] = [];
  readonly messages: WireMessage[] = [];
  peakConcurrent = 0;
  private concurrent = 0;

  constructor(private readonly script: SendScript = () => undefined) {}

  async send(message: WireMessage): Promise<void> {
    this.messages.push(message);
    this.sent.push({
      messageId: message.messageId,
      correlationId: message.correlationId,
      contentType: message.contentType,
      busyRetries: message.busyRetries,
      body: Buffer.from(message.body).toString('utf8'),
    });

    this.concurrent++;
    this.peakConcurrent = Math.max(this.peakConcurrent, this.concurrent);
    try {
      await this.script(message, this.sent.length);
    } finally {
      this.concurrent--;
    }
  }
}

export class FakeConnectionHandler implements ConnectionHandler {
  uses = 0;
  disposals = 0;

  /** `connectionFaults` are thrown by the first uses, before the sender is reached */
  constructor(
    private readonly sender: MessageSender,
    private readonly connectionFaults: unknown[] = []
  ) {}

  async use<R>(action: (connection: Connection) => Promise<R>): Promise<R> {
    this.uses++;
    if (this.connectionFaults.length > 0) {
      throw this.connectionFaults.shift();
    }
    return action({ messageSender: this.sender });
  }

  dispose(): void {
    this.disposals++;
  }
}

export class FakeAddress implements EndpointAddress {
  disposals = 0;

  constructor(public readonly uri = 'sb://test/queue') {}

  dispose(): void {
    this.disposals++;
  }
}

export class RecordingObserver implements SendObserver {
  readonly begins: SendEvent[] = [];
  readonly ends: SendEvent[] = [];
  readonly retries: RetryScheduledSendEvent[] = [];

  beginSend(event: SendEvent): void {
    this.begins.push(event);
  }

  endSend(event: SendEvent): void {
    this.ends.push(event);
  }

  retryScheduled(event: RetryScheduledSendEvent): void {
    this.retries.push(event);
  }
}

export function createGate(): { wait: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const wait = new Promise<void>(resolve => {
    open = resolve;
  });
  return { wait, open };
}

/** Let every pending promise callback run */
export const flush = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

export const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/** Small seeded PRNG so randomized tests replay identically */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
