import type { MessageSerializer, SendContext } from './types.js';

/**
 * UTF-8 JSON body
 */
export class JsonMessageSerializer<T = unknown> implements MessageSerializer<T> {
  public readonly contentType = 'application/json';

  serialize(context: SendContext<T>): Uint8Array {
    const json = JSON.stringify(context.message);
    if (json === undefined) {
      throw new TypeError('Message is not JSON-serializable');
    }
    return Buffer.from(json, 'utf8');
  }
}
