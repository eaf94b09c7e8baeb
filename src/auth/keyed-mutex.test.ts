/**
 * Unit Tests for KeyedMutex
 */

import { deferred } from '../testing/fakes';
import { KeyedMutex } from './keyed-mutex';

describe('KeyedMutex', () => {
  it('should run tasks for the same key one at a time, in arrival order', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred<void>();
    const events: string[] = [];

    const first = mutex.runExclusive('s1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = mutex.runExclusive('s1', () => {
      events.push('second');
      return 2;
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(events).toEqual(['first:start']);
    expect(mutex.isLocked('s1')).toBe(true);

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should not block tasks for other keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred<void>();

    const blocked = mutex.runExclusive('s1', () => gate.promise);
    await expect(mutex.runExclusive('s2', () => 'done')).resolves.toBe('done');

    gate.resolve();
    await blocked;
  });

  it('should release the key when a task throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('s1', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('s1', () => 'next')).resolves.toBe('next');
    expect(mutex.isLocked('s1')).toBe(false);
  });

  it('should forget idle keys', async () => {
    const mutex = new KeyedMutex();

    await mutex.runExclusive('s1', () => undefined);

    expect(mutex.isLocked('s1')).toBe(false);
  });
});
