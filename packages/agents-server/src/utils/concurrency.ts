export class Semaphore {
  private available: number
  private queue: Array<() => void> = []
  private readonly capacity: number

  constructor(limit: number) {
    this.available = Math.max(1, Math.floor(limit || 1))
    this.capacity = this.available
  }

  get used() {
    return this.capacity - this.available
  }

  get pending() {
    return this.queue.length
  }

  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available -= 1
      return this.releaser()
    }
    await new Promise<void>((resolve) => this.queue.push(resolve))
    return this.releaser()
  }

  // Hands the slot straight to the next waiter so a newcomer cannot jump the queue.
  private releaser() {
    let released = false
    return () => {
      if (released) return
      released = true
      const next = this.queue.shift()
      if (next) {
        next()
        return
      }
      this.available = Math.min(this.capacity, this.available + 1)
    }
  }
}

/**
 * One FIFO lock per key. Work for the same key runs strictly one at a time;
 * different keys never wait on each other. Idle keys are dropped.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, Semaphore>()

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key)
    if (!lock) {
      lock = new Semaphore(1)
      this.locks.set(key, lock)
    }
    const release = await lock.acquire()
    try {
      return await fn()
    } finally {
      release()
      if (lock.used === 0 && lock.pending === 0 && this.locks.get(key) === lock) {
        this.locks.delete(key)
      }
    }
  }

  isLocked(key: string) {
    const lock = this.locks.get(key)
    return Boolean(lock && lock.used > 0)
  }

  get size() {
    return this.locks.size
  }
}
