/**
 * Zod schemas for tickloop events and results
 *
 * Design decisions:
 * - snake_case for data fields: events and results serialize straight to JSON
 * - camelCase for methods: Idiomatic TypeScript
 * - ISO 8601 strings for datetime: Universal format, no unix timestamps
 * - String UUIDs: No UUID objects, just validated strings containing UUIDs
 */

import { z } from 'zod'

// =============================================================================
// Custom Validators
// =============================================================================

/** Validates UUID string format (any version) */
export const UUIDStr = z.string().uuid()

/** Handler key an event is routed by */
export const EventKeyStr = z.string().min(1, 'Event key must not be empty')

/** ISO 8601 datetime string */
export const DateTimeStr = z.string().datetime({ offset: true })

// =============================================================================
// Event Mode
// =============================================================================

/**
 * How an event's handler is executed.
 * - sync: the driver awaits the handler before the tick returns
 * - async: the handler runs as an independent task, its result is queued
 */
export const EventMode = {
  SYNC: 'sync',
  ASYNC: 'async',
} as const

export type EventMode = (typeof EventMode)[keyof typeof EventMode]

/** Zod schema for EventMode */
export const EventModeSchema = z.enum(['sync', 'async'])

// =============================================================================
// LoopEvent Schema
// =============================================================================

/** Zod schema for parsing a LoopEvent from JSON or constructor input */
export const LoopEventSchema = z.object({
  event_id: UUIDStr,
  key: EventKeyStr,
  payload: z.string(),
  mode: EventModeSchema,
  event_created_at: DateTimeStr,
})

export type LoopEventData = z.infer<typeof LoopEventSchema>

// =============================================================================
// EventResult Schema
// =============================================================================

/** Schema for EventResult - output of a single handler execution */
export const EventResultSchema = z.object({
  event_id: UUIDStr,
  key: EventKeyStr,
  result: z.string(),
  mode: EventModeSchema,
  started_at: DateTimeStr,
  completed_at: DateTimeStr,
  duration_ms: z.number().nonnegative(),
})

export type EventResultData = z.infer<typeof EventResultSchema>

// =============================================================================
// Helper Types
// =============================================================================

/** Passed to every handler invocation alongside the payload */
export interface HandlerContext {
  readonly key: string
  readonly event_id: string
  readonly mode: EventMode
  /** Aborted when the dispatch times out or its caller-supplied signal fires */
  readonly signal: AbortSignal
}

/**
 * Handler function type. Handlers report failures inside the returned string;
 * a thrown error is still caught and encoded by the execution engine.
 */
export type Handler = (payload: string, context: HandlerContext) => string | Promise<string>

/** Per-dispatch execution limits */
export interface DispatchOptions {
  /** Seconds before the handler is abandoned (null = no limit) */
  timeout?: number | null
  /** Abandons the handler when aborted */
  signal?: AbortSignal
}

/** Longest timeout a Node timer can hold, in whole seconds (2^31 - 1 ms) */
export const MAX_TIMEOUT_SECONDS = 2_147_483

/** Zod schema for the serializable part of DispatchOptions */
export const DispatchTimeoutSchema = z.number().positive().max(MAX_TIMEOUT_SECONDS).nullable()

/** Where the loop writes its diagnostics (defaults to console) */
export type LoopLogger = Pick<Console, 'info' | 'warn' | 'error'>
