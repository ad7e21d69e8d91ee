import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../../src/utils/keyed-mutex.js';
import { CancelledError } from '../../src/types/errors.js';
import { deferred } from '../helpers/fake-transport.js';

describe('KeyedMutex', () => {
  it('should run holders of one key in arrival order', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];

    const first = mutex.runExclusive('p-1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = mutex.runExclusive('p-1', async () => {
      events.push('second');
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(events).toEqual(['first:start']);
    expect(mutex.isLocked('p-1')).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked('p-1')).toBe(false);
  });

  it('should not block different keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const held = mutex.runExclusive('p-1', () => gate.promise);
    const other = await mutex.runExclusive('p-2', async () => 'p-2 done');

    expect(other).toBe('p-2 done');
    gate.resolve();
    await held;
  });

  it('should release the key when the holder throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('p-1', async () => {
        throw new Error('start failed');
      })
    ).rejects.toThrow('start failed');

    expect(await mutex.runExclusive('p-1', async () => 42)).toBe(42);
    expect(mutex.isLocked('p-1')).toBe(false);
  });

  it('should stop waiting for the key when the signal aborts', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];
    const controller = new AbortController();

    const held = mutex.runExclusive('p-1', async () => {
      await gate.promise;
      events.push('held');
    });
    const cancelled = mutex.runExclusive(
      'p-1',
      async () => {
        events.push('cancelled');
      },
      controller.signal
    );
    const later = mutex.runExclusive('p-1', async () => {
      events.push('later');
    });

    controller.abort();
    await expect(cancelled).rejects.toBeInstanceOf(CancelledError);
    expect(events).toEqual([]);

    gate.resolve();
    await Promise.all([held, later]);

    expect(events).toEqual(['held', 'later']);
    expect(mutex.isLocked('p-1')).toBe(false);
  });

  it('should refuse an already aborted signal without queueing', async () => {
    const mutex = new KeyedMutex();
    const controller = new AbortController();
    controller.abort();

    await expect(
      mutex.runExclusive('p-1', async () => 'ran', controller.signal)
    ).rejects.toBeInstanceOf(CancelledError);
    expect(mutex.isLocked('p-1')).toBe(false);
  });

  it('should free the key once the holder ahead of a cancelled waiter finishes', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const controller = new AbortController();

    const held = mutex.runExclusive('p-1', () => gate.promise);
    const cancelled = mutex.runExclusive('p-1', async () => undefined, controller.signal);
    controller.abort();
    await expect(cancelled).rejects.toBeInstanceOf(CancelledError);
    expect(mutex.isLocked('p-1')).toBe(true);

    gate.resolve();
    await held;
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(mutex.isLocked('p-1')).toBe(false);
  });
});
