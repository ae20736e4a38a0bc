/**
 * Bounds the number of physical sends in flight
 */

import { SendCancelledError } from '@brokerlink/errors';
import { throwIfAborted } from '@brokerlink/retry';

interface Waiter {
  grant(): void;
}

/**
 * One unit of in-flight capacity. Releasing more than once has no effect.
 */
export class ThrottleSlot {
  private released = false;

  constructor(private readonly onRelease: () => void) {}

  get isReleased(): boolean {
    return this.released;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.onRelease();
  }
}

/**
 * Counting gate with parked waiters.
 *
 * A released slot is handed straight to the next waiter, so the in-flight
 * count never rises above `maxOutstanding`. Waiters are served in arrival
 * order, though callers must not rely on it.
 */
export class InFlightThrottle {
  private inFlightCount = 0;
  private peak = 0;
  private readonly waiters: Waiter[] = [];

  constructor(public readonly maxOutstanding: number) {
    if (!Number.isInteger(maxOutstanding) || maxOutstanding < 1) {
      throw new Error('maxOutstanding must be a positive integer');
    }
  }

  get inFlight(): number {
    return this.inFlightCount;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  /** Highest in-flight count observed since construction */
  get peakInFlight(): number {
    return this.peak;
  }

  /**
   * Resolve with a slot once fewer than `maxOutstanding` are in flight
   */
  acquire(signal?: AbortSignal): Promise<ThrottleSlot> {
    try {
      throwIfAborted(signal);
    } catch (error) {
      return Promise.reject(error);
    }

    if (this.inFlightCount < this.maxOutstanding) {
      this.inFlightCount++;
      this.peak = Math.max(this.peak, this.inFlightCount);
      return Promise.resolve(this.createSlot());
    }

    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(new SendCancelledError(signal?.reason));
      };

      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve(this.createSlot());
        },
      };

      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private createSlot(): ThrottleSlot {
    return new ThrottleSlot(() => this.release());
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // the slot changes hands; in-flight count is unchanged
      next.grant();
      return;
    }
    this.inFlightCount--;
  }
}
