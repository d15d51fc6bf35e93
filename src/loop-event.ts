/**
 * LoopEvent - a unit of submitted work identified by a handler key
 *
 * @example
 * ```typescript
 * const event = new LoopEvent({ key: 'hello-0', payload: 'How are you doing today?', mode: 'async' })
 * loop.submit(event)
 * ```
 */

import { EventMode, LoopEventSchema, type LoopEventData } from './schemas.js'
import { generateUUID7, nowISO } from './utils.js'

export interface LoopEventInit {
  key: string
  payload?: string
  mode?: EventMode
  event_id?: string
  event_created_at?: string
}

/**
 * Immutable event. Fields are validated with Zod and the instance is frozen
 * on construction, so what was submitted is exactly what gets executed.
 */
export class LoopEvent {
  readonly event_id: string
  readonly key: string
  readonly payload: string
  readonly mode: EventMode
  readonly event_created_at: string

  constructor(init: LoopEventInit) {
    const data = LoopEventSchema.parse({
      event_id: init.event_id ?? generateUUID7(),
      key: init.key,
      payload: init.payload ?? '',
      mode: init.mode ?? EventMode.SYNC,
      event_created_at: init.event_created_at ?? nowISO(),
    })

    this.event_id = data.event_id
    this.key = data.key
    this.payload = data.payload
    this.mode = data.mode
    this.event_created_at = data.event_created_at

    Object.freeze(this)
  }

  get isAsync(): boolean {
    return this.mode === EventMode.ASYNC
  }

  toString(): string {
    return `${this.key}#${this.event_id.slice(-4)} [${this.mode}]`
  }

  toJSON(): LoopEventData {
    return {
      event_id: this.event_id,
      key: this.key,
      payload: this.payload,
      mode: this.mode,
      event_created_at: this.event_created_at,
    }
  }

  static fromJSON(json: string | Record<string, unknown>): LoopEvent {
    const raw: unknown = typeof json === 'string' ? JSON.parse(json) : json
    return new LoopEvent(LoopEventSchema.parse(raw))
  }
}
