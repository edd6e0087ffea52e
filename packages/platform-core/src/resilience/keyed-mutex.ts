import { DomainError } from '../error-handling/errors.js';

export interface KeyedMutexConfig {
  /** Waiters allowed per key before acquire() is rejected */
  maxQueuePerKey: number;
}

export const DEFAULT_KEYED_MUTEX_CONFIG: KeyedMutexConfig = {
  maxQueuePerKey: 1000,
};

export type MutexRelease = () => void;

interface KeyState {
  held: boolean;
  queue: Array<() => void>;
}

/**
 * Exclusive lock per string key with FIFO hand-off.
 *
 * Each key behaves like a bulkhead of width one. The returned release
 * function is idempotent; keys with no holder and no waiters are dropped.
 */
export class KeyedMutex {
  private readonly keys = new Map<string, KeyState>();

  constructor(private readonly config: KeyedMutexConfig = DEFAULT_KEYED_MUTEX_CONFIG) {}

  async acquire(key: string): Promise<MutexRelease> {
    const state = this.keys.get(key);

    if (!state) {
      this.keys.set(key, { held: true, queue: [] });
      return this.releaserFor(key);
    }

    if (!state.held) {
      state.held = true;
      return this.releaserFor(key);
    }

    if (state.queue.length >= this.config.maxQueuePerKey) {
      throw new DomainError(`Lock queue full for ${key}`, 503);
    }

    return new Promise(resolve => {
      state.queue.push(() => resolve(this.releaserFor(key)));
    });
  }

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await work();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.keys.get(key)?.held ?? false;
  }

  getStats() {
    let waiting = 0;
    for (const state of this.keys.values()) waiting += state.queue.length;
    return { lockedKeys: this.keys.size, waiting };
  }

  private releaserFor(key: string): MutexRelease {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release(key);
    };
  }

  private release(key: string): void {
    const state = this.keys.get(key);
    if (!state) return;

    const next = state.queue.shift();
    if (next) {
      // ownership passes straight to the next waiter
      next();
      return;
    }

    state.held = false;
    this.keys.delete(key);
  }
}
