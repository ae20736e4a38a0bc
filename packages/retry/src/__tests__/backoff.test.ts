/**
 * Tests for backoff strategies and abortable sleep
 */

import { SendCancelledError } from '@brokerlink/errors';
import { describe, it, expect } from 'vitest';

import { exponentialCappedBackoff, fixedBackoff, formatDelay, sleep } from '../index.js';

describe('exponentialCappedBackoff', () => {
  const backoff = exponentialCappedBackoff();

  it('should grow as trunc(1.1^(8 * attempt)) with the defaults', () => {
    const delays = Array.from({ length: 13 }, (_, i) => backoff.calculateDelay(i + 1));

    expect(delays).toEqual([2, 4, 9, 21, 45, 97, 207, 445, 955, 2048, 4390, 9412, 20176]);
  });

  it('should stop growing past the cutoff', () => {
    expect(backoff.calculateDelay(14)).toBe(20176);
    expect(backoff.calculateDelay(100)).toBe(20176);
  });

  it('should never decrease', () => {
    for (let attempt = 1; attempt < 20; attempt++) {
      expect(backoff.calculateDelay(attempt + 1)).toBeGreaterThanOrEqual(backoff.calculateDelay(attempt));
    }
  });

  it('should honor custom parameters', () => {
    const custom = exponentialCappedBackoff({ base: 2, exponentFactor: 1, cutoff: 3 });

    expect([1, 2, 3, 4].map(attempt => custom.calculateDelay(attempt))).toEqual([2, 4, 8, 8]);
    expect(custom.kind).toBe('exponential-capped');
  });

  it('should reject parameters that cannot grow', () => {
    expect(() => exponentialCappedBackoff({ base: 1, exponentFactor: 8, cutoff: 13 })).toThrow(
      'base must be greater than 1'
    );
    expect(() => exponentialCappedBackoff({ base: 1.1, exponentFactor: 8, cutoff: 0 })).toThrow(
      'cutoff must be a positive integer'
    );
  });
});

describe('fixedBackoff', () => {
  it('should return the same delay for every attempt', () => {
    const backoff = fixedBackoff(5);

    expect([1, 2, 10, 50].map(attempt => backoff.calculateDelay(attempt))).toEqual([5, 5, 5, 5]);
    expect(backoff.kind).toBe('fixed');
  });

  it('should reject negative delays', () => {
    expect(() => fixedBackoff(-1)).toThrow('delayMs must be a non-negative number');
  });
});

describe('sleep', () => {
  it('should resolve after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });

  it('should reject with the abort reason when cancelled mid-wait', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);

    controller.abort('shutdown');

    await expect(pending).rejects.toBeInstanceOf(SendCancelledError);
    await expect(pending).rejects.toMatchObject({ cause: 'shutdown' });
  });

  it('should reject at once on an already aborted signal', async () => {
    await expect(sleep(60_000, AbortSignal.abort())).rejects.toBeInstanceOf(SendCancelledError);
  });
});

describe('formatDelay', () => {
  it('should pick a readable unit', () => {
    expect(formatDelay(5)).toBe('5ms');
    expect(formatDelay(2048)).toBe('2.0s');
    expect(formatDelay(90_000)).toBe('1.5m');
  });
});
