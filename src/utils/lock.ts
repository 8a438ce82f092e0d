/**
 * Promise-chained mutex. Callbacks run one at a time in submission order;
 * a rejected callback does not poison the lock for later ones.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve()
  private pending = 0

  inLock<T>(fn: () => T | Promise<T>): Promise<T> {
    this.pending++
    const run = this.tail.then(fn)
    this.tail = run.then(
      () => { this.pending-- },
      () => { this.pending-- },
    )
    return run
  }

  isLocked(): boolean {
    return this.pending > 0
  }
}

/**
 * One AsyncLock per key, created on first use
 */
export class KeyedLocks {
  private readonly locks = new Map<string, AsyncLock>()

  get(key: string): AsyncLock {
    let lock = this.locks.get(key)
    if (!lock) {
      lock = new AsyncLock()
      this.locks.set(key, lock)
    }
    return lock
  }

  inLock<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    return this.get(key).inLock(fn)
  }
}
