/**
 * Mutual exclusion for a named resource across processes.
 *
 * The session manager only uses it around per-user index mutations (capacity
 * eviction); correctness never depends on it because the sweep repairs any drift.
 */
export interface LockProvider {
  withLock<T>(name: string, ttlSeconds: number, fn: () => Promise<T>): Promise<T>;
}

/**
 * Runs the callback immediately without taking any lock.
 */
export class NoopLockProvider implements LockProvider {
  async withLock<T>(_name: string, _ttlSeconds: number, fn: () => Promise<T>): Promise<T> {
    return fn();
  }
}
