/**
 * Keyed Mutex - per-key serialization of async work
 *
 * Calls sharing a key run one at a time in arrival order; calls with
 * different keys run concurrently.
 */

import { CancelledError } from '../types/errors.js';

export class KeyedMutex<K = string> {
  private tails: Map<K, Promise<void>> = new Map();

  /**
   * Run fn once every earlier holder of `key` has finished. Aborting `signal`
   * while waiting rejects with CancelledError and gives up the place in line;
   * later callers still queue behind the earlier holders.
   */
  async runExclusive<T>(key: K, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    let release: () => void = () => {};
    const lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tails.get(key) ?? Promise.resolve();
    const tail = previous.then(() => lock);
    this.tails.set(key, tail);

    try {
      await waitForTurn(previous, signal);
    } catch (error) {
      release();
      void tail.then(() => this.forget(key, tail));
      throw error;
    }

    try {
      return await fn();
    } finally {
      release();
      this.forget(key, tail);
    }
  }

  isLocked(key: K): boolean {
    return this.tails.has(key);
  }

  private forget(key: K, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}

function waitForTurn(previous: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) {
    return previous;
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    void previous.then(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    });
  });
}
