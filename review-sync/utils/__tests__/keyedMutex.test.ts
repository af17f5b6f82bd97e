import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../keyedMutex';
import { delay } from '../delay';

describe('KeyedMutex', () => {
  it('should run sections with the same key one at a time', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const section = (name: string, ms: number) =>
      mutex.runExclusive('p-1', async () => {
        events.push(`${name}:start`);
        await delay(ms);
        events.push(`${name}:end`);
      });

    await Promise.all([section('a', 20), section('b', 0)]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('should let different keys overlap', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    await Promise.all([
      mutex.runExclusive('p-1', async () => {
        events.push('p-1:start');
        await delay(20);
        events.push('p-1:end');
      }),
      mutex.runExclusive('p-2', async () => {
        events.push('p-2:start');
        events.push('p-2:end');
      }),
    ]);

    expect(events).toEqual(['p-1:start', 'p-2:start', 'p-2:end', 'p-1:end']);
  });

  it('should release the key when a section throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('p-1', async () => {
        throw new Error('write failed');
      })
    ).rejects.toThrow('write failed');

    await expect(mutex.runExclusive('p-1', async () => 'next')).resolves.toBe('next');
  });
});
