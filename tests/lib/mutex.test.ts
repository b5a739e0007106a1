/**
 * Tests for the async mutex
 */

import { describe, it, expect } from 'vitest';
import { Mutex } from '../../src/lib/mutex';

describe('Mutex', () => {
  it('should run tasks one at a time in submission order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = mutex.runExclusive(async () => {
      events.push('first:start');
      await firstGate;
      events.push('first:end');
      return 1;
    });
    const second = mutex.runExclusive(async () => {
      events.push('second:start');
      return 2;
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['first:start']);
    expect(mutex.locked).toBe(true);

    releaseFirst();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    expect(mutex.locked).toBe(false);
  });

  it('should release the lock when a task throws', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('failed');
      })
    ).rejects.toThrow('failed');

    await expect(mutex.runExclusive(() => 'next')).resolves.toBe('next');
  });
});
