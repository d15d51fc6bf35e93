/**
 * HandlerRegistry - maps event keys to the handler that computes their result
 */

import type { Handler } from './schemas.js'

export class HandlerRegistry {
  private _handlers: Map<string, Handler> = new Map()

  /** Store handler under key. An existing handler for key is replaced. */
  register(key: string, handler: Handler): void {
    this._handlers.set(key, handler)
  }

  /** The handler for key, or undefined when none is registered */
  lookup(key: string): Handler | undefined {
    return this._handlers.get(key)
  }

  has(key: string): boolean {
    return this._handlers.has(key)
  }

  unregister(key: string): boolean {
    return this._handlers.delete(key)
  }

  keys(): string[] {
    return [...this._handlers.keys()]
  }

  get size(): number {
    return this._handlers.size
  }

  clear(): void {
    this._handlers.clear()
  }
}
