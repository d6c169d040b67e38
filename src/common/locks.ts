export type ReleaseLock = () => void;

interface Waiter {
  exclusive: boolean;
  grant: () => void;
}

interface LockState {
  readers: number;
  writer: boolean;
  waiters: Waiter[];
}

/**
 * Readers/writer locks addressed by string key. Shared holders run together,
 * an exclusive holder runs alone. Waiters are granted strictly in arrival
 * order, so a queued writer is never starved by a stream of readers.
 *
 * State for a key exists only while the key is held or awaited.
 *
 * @example
 * ```typescript
 * const locks = new KeyedReadWriteLock();
 * await locks.withExclusive("bucket-a", async () => {
 *   // nothing else holds "bucket-a" here
 * });
 * ```
 */
export class KeyedReadWriteLock {
  private states = new Map<string, LockState>();

  get activeKeys(): number {
    return this.states.size;
  }

  acquireShared(key: string): Promise<ReleaseLock> {
    return this.acquire(key, false);
  }

  acquireExclusive(key: string): Promise<ReleaseLock> {
    return this.acquire(key, true);
  }

  async withShared<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireShared(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireExclusive(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private acquire(key: string, exclusive: boolean): Promise<ReleaseLock> {
    let state = this.states.get(key);
    if (!state) {
      state = { readers: 0, writer: false, waiters: [] };
      this.states.set(key, state);
    }

    if (state.waiters.length === 0 && canGrant(state, exclusive)) {
      take(state, exclusive);
      return Promise.resolve(this.releaser(key, state, exclusive));
    }

    const queued = state;
    return new Promise((resolve) => {
      queued.waiters.push({
        exclusive,
        grant: () => resolve(this.releaser(key, queued, exclusive)),
      });
    });
  }

  private releaser(key: string, state: LockState, exclusive: boolean): ReleaseLock {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (exclusive) {
        state.writer = false;
      } else {
        state.readers--;
      }
      this.drain(key, state);
    };
  }

  private drain(key: string, state: LockState): void {
    while (state.waiters.length > 0) {
      const next = state.waiters[0];
      if (!canGrant(state, next.exclusive)) break;
      state.waiters.shift();
      take(state, next.exclusive);
      next.grant();
    }

    if (!state.writer && state.readers === 0 && state.waiters.length === 0) {
      this.states.delete(key);
    }
  }
}

function canGrant(state: LockState, exclusive: boolean): boolean {
  return exclusive ? !state.writer && state.readers === 0 : !state.writer;
}

function take(state: LockState, exclusive: boolean): void {
  if (exclusive) {
    state.writer = true;
  } else {
    state.readers++;
  }
}
