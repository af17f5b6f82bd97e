import { describe, it, expect } from 'vitest';
import { delay, pickDelayMs } from '../delay';

describe('pickDelayMs', () => {
  it('should stay within the inclusive range', () => {
    const range = { minMs: 2000, maxMs: 5000 };
    expect(pickDelayMs(range, () => 0)).toBe(2000);
    expect(pickDelayMs(range, () => 0.999999)).toBe(5000);
    expect(pickDelayMs(range, () => 0.5)).toBe(3500);
  });

  it('should accept a swapped range', () => {
    expect(pickDelayMs({ minMs: 3000, maxMs: 1000 }, () => 0)).toBe(1000);
  });

  it('should return the single value of a fixed range', () => {
    expect(pickDelayMs({ minMs: 0, maxMs: 0 }, () => 0.7)).toBe(0);
  });
});

describe('delay', () => {
  it('should resolve early when the signal aborts', async () => {
    const abort = new AbortController();
    const started = Date.now();
    const waiting = delay(10_000, abort.signal);
    abort.abort();

    await waiting;

    expect(Date.now() - started).toBeLessThan(1000);
  });
});
