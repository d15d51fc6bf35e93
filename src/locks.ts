/**
 * Async locking primitives.
 *
 * Every continuation in Node runs on one thread, but an async critical section
 * can still interleave with others at each `await`. AsyncSemaphore serializes
 * such sections in FIFO order.
 */

export class AsyncSemaphore {
  readonly size: number
  private _inUse = 0
  private _waiters: Array<() => void> = []

  constructor(size = 1) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`AsyncSemaphore size must be a positive integer, got ${size}`)
    }
    this.size = size
  }

  /** Number of permits currently held */
  get inUse(): number {
    return this._inUse
  }

  /** Number of callers blocked in acquire() */
  get waiting(): number {
    return this._waiters.length
  }

  async acquire(): Promise<void> {
    if (this._inUse < this.size) {
      this._inUse++
      return
    }
    // the releasing caller hands its permit straight to us, _inUse stays put
    await new Promise<void>((resolve) => {
      this._waiters.push(resolve)
    })
  }

  release(): void {
    const next = this._waiters.shift()
    if (next) {
      next()
      return
    }
    if (this._inUse === 0) {
      throw new Error('AsyncSemaphore released more times than acquired')
    }
    this._inUse--
  }
}

/** Run fn while holding one permit of semaphore */
export async function runWithSemaphore<T>(
  semaphore: AsyncSemaphore,
  fn: () => T | Promise<T>
): Promise<T> {
  await semaphore.acquire()
  try {
    return await fn()
  } finally {
    semaphore.release()
  }
}
