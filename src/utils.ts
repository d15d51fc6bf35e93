/**
 * Utility functions for tickloop
 */

import { v7 as uuidv7 } from 'uuid'

/**
 * Generate a UUIDv7 string (time-ordered UUID)
 */
export function generateUUID7(): string {
  return uuidv7()
}

/**
 * Get current ISO 8601 datetime string
 */
export function nowISO(): string {
  return new Date().toISOString()
}

/**
 * Create a deferred promise that can be resolved/rejected externally
 */
export interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (error: Error) => void
}

export function createDeferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void
  let reject!: (error: Error) => void

  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })

  return { promise, resolve, reject }
}

/**
 * Wait for a specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Resolve on the next macrotask, after every pending microtask has run
 */
export function nextMacrotask(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

/** Milliseconds elapsed since a `performance.now()` reading, rounded to 0.01ms */
export function elapsedMs(startedAt: number): number {
  return Math.round((performance.now() - startedAt) * 100) / 100
}

/** Render any thrown value as an `Error: <message>` result string */
export function describeError(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err)
  return `Error: ${message}`
}

// =============================================================================
// Event keys
// =============================================================================

/**
 * Build a unique event key from a base label and a sequence counter.
 *
 * @example
 * ```typescript
 * generateUniqueEventKey('read-file', 3) // 'read-file-3'
 * ```
 */
export function generateUniqueEventKey(base: string, counter: number): string {
  return `${base}-${counter}`
}

/**
 * Monotonic counter around generateUniqueEventKey.
 * One sequence never repeats a key, whatever bases are passed.
 */
export class EventKeySequence {
  private _counter: number

  constructor(start = 0) {
    this._counter = start
  }

  /** The counter value the next key will use */
  get counter(): number {
    return this._counter
  }

  next(base: string): string {
    const key = generateUniqueEventKey(base, this._counter)
    this._counter++
    return key
  }
}
