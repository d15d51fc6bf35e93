/**
 * Queues driving the event loop
 *
 * - FifoQueue: pending events, insertion order
 * - CompletedQueue: results of async executions, completion order, mutated
 *   from concurrently running tasks so every operation holds a lock
 */

import type { EventResult } from './event-result.js'
import { AsyncSemaphore, runWithSemaphore } from './locks.js'

/**
 * Unbounded first-in first-out queue.
 *
 * Dequeue is O(1): items are read through a head index and the backing array
 * is compacted once the consumed prefix outgrows the live part.
 */
export class FifoQueue<T> {
  private _items: T[] = []
  private _head = 0

  get size(): number {
    return this._items.length - this._head
  }

  get isEmpty(): boolean {
    return this.size === 0
  }

  enqueue(item: T): void {
    this._items.push(item)
  }

  /** Remove and return the oldest item, or undefined when empty */
  dequeue(): T | undefined {
    if (this._head >= this._items.length) return undefined

    const item = this._items[this._head]
    this._head++

    if (this._head >= 32 && this._head * 2 >= this._items.length) {
      this._items = this._items.slice(this._head)
      this._head = 0
    }
    return item
  }

  peek(): T | undefined {
    return this._items[this._head]
  }

  toArray(): T[] {
    return this._items.slice(this._head)
  }

  clear(): void {
    this._items = []
    this._head = 0
  }
}

/**
 * Completed Queue. Async tasks append from wherever they finish, the loop
 * drains from its tick; both sides go through the same semaphore.
 */
export class CompletedQueue {
  private readonly _queue = new FifoQueue<EventResult>()
  private readonly _lock = new AsyncSemaphore(1)

  get size(): number {
    return this._queue.size
  }

  get isEmpty(): boolean {
    return this._queue.isEmpty
  }

  enqueue(result: EventResult): Promise<void> {
    return runWithSemaphore(this._lock, () => {
      this._queue.enqueue(result)
    })
  }

  dequeue(): Promise<EventResult | undefined> {
    return runWithSemaphore(this._lock, () => this._queue.dequeue())
  }

  /** Snapshot of queued results, oldest first */
  toArray(): EventResult[] {
    return this._queue.toArray()
  }

  clear(): Promise<void> {
    return runWithSemaphore(this._lock, () => {
      this._queue.clear()
    })
  }
}
