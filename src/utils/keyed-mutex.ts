// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Keyed Mutex
 *
 * Serializes async work per key. Work under different keys runs
 * concurrently; work under the same key runs in arrival order.
 */

interface QueuedWaiter {
  resolve: () => void;
}

interface KeyState {
  locked: boolean;
  queue: QueuedWaiter[];
}

export class KeyedMutex {
  private readonly keys = new Map<string, KeyState>();

  /**
   * Acquire the lock for a key (waits while another holder has it).
   */
  acquire(key: string): Promise<void> {
    const state = this.keys.get(key);
    if (!state) {
      this.keys.set(key, { locked: true, queue: [] });
      return Promise.resolve();
    }
    if (!state.locked) {
      state.locked = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      state.queue.push({ resolve });
    });
  }

  /**
   * Release the lock for a key, handing it to the next waiter if any.
   */
  release(key: string): void {
    const state = this.keys.get(key);
    if (!state) return;

    const next = state.queue.shift();
    if (next) {
      // Ownership passes directly; the key stays locked
      next.resolve();
      return;
    }
    this.keys.delete(key);
  }

  /**
   * Run a function while holding the lock for a key.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    await this.acquire(key);
    try {
      return await fn();
    } finally {
      this.release(key);
    }
  }

  isLocked(key: string): boolean {
    return this.keys.get(key)?.locked ?? false;
  }

  /** Number of waiters queued behind the current holder of a key. */
  pending(key: string): number {
    return this.keys.get(key)?.queue.length ?? 0;
  }
}
