/**
 * EventResult - output of a single handler execution
 */

import { EventResultSchema, type EventMode, type EventResultData } from './schemas.js'

export interface EventResultOptions {
  event_id: string
  key: string
  result: string
  mode: EventMode
  started_at: string
  completed_at: string
  duration_ms: number
}

/**
 * Result of running one event's handler exactly once.
 * Failures are carried inside `result` as an `Error: ...` string.
 */
export class EventResult {
  readonly event_id: string
  readonly key: string
  readonly result: string
  readonly mode: EventMode

  // Timing
  readonly started_at: string
  readonly completed_at: string
  readonly duration_ms: number

  constructor(options: EventResultOptions) {
    this.event_id = options.event_id
    this.key = options.key
    this.result = options.result
    this.mode = options.mode
    this.started_at = options.started_at
    this.completed_at = options.completed_at
    this.duration_ms = options.duration_ms

    Object.freeze(this)
  }

  toString(): string {
    return `${this.key}() -> ${this.result} (${this.mode}, ${this.duration_ms}ms)`
  }

  toJSON(): EventResultData {
    return {
      event_id: this.event_id,
      key: this.key,
      result: this.result,
      mode: this.mode,
      started_at: this.started_at,
      completed_at: this.completed_at,
      duration_ms: this.duration_ms,
    }
  }

  /**
   * Create an EventResult from JSON data
   */
  static fromJSON(json: string | Record<string, unknown>): EventResult {
    const raw: unknown = typeof json === 'string' ? JSON.parse(json) : json
    return new EventResult(EventResultSchema.parse(raw))
  }
}
