import type { DelayRange } from '../core/types';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolves after `ms`; resolves early when the signal aborts so the caller
 * can notice the abort at its next check.
 */
export const delay: Sleep = (ms, signal) => {
  return new Promise(resolve => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

/** Uniform random integer in [minMs, maxMs] */
export function pickDelayMs(range: DelayRange, random: () => number = Math.random): number {
  const min = Math.max(0, Math.min(range.minMs, range.maxMs));
  const max = Math.max(0, Math.max(range.minMs, range.maxMs));
  return Math.floor(min + random() * (max - min + 1));
}
