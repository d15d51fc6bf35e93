/**
 * ExecutionEngine - runs one event's handler, inline or as a spawned task
 *
 * - sync: the handler is awaited and its EventResult returned to the caller
 * - async: the handler starts on a later macrotask, so execute() returns
 *   before it runs; the finished EventResult is appended to the CompletedQueue
 *
 * Handler failures never escape: thrown errors, rejections, timeouts and
 * aborts all end up as an `Error: ...` result string.
 */

import { EventResult } from './event-result.js'
import { HandlerAbortedError, HandlerTimeoutError } from './errors.js'
import type { HandlerRegistry } from './handler-registry.js'
import type { LoopEvent } from './loop-event.js'
import type { CompletedQueue } from './queues.js'
import {
  DispatchTimeoutSchema,
  EventMode,
  type DispatchOptions,
  type Handler,
  type HandlerContext,
  type LoopLogger,
} from './schemas.js'
import { describeError, elapsedMs, nextMacrotask, nowISO } from './utils.js'

// =============================================================================
// Types
// =============================================================================

export type ExecutionOutcome =
  /** No handler registered for the event's key */
  | { status: 'skipped' }
  /** Sync execution finished, result goes straight to the output sink */
  | { status: 'completed'; result: EventResult }
  /** Async execution spawned; task settles once the result is queued */
  | { status: 'deferred'; task: Promise<void> }

export interface ExecutionEngineOptions {
  completed: CompletedQueue
  logger?: LoopLogger
  /** Prefix for log lines */
  name?: string
  /** Timeout in seconds used when a dispatch does not set one (default: null) */
  defaultTimeout?: number | null
  /** Suppress informational logs */
  quiet?: boolean
}

// =============================================================================
// ExecutionEngine
// =============================================================================

export class ExecutionEngine {
  readonly defaultTimeout: number | null

  private readonly _completed: CompletedQueue
  private readonly _logger: LoopLogger
  private readonly _prefix: string
  private readonly _quiet: boolean
  private _inFlight: Set<Promise<void>> = new Set()
  /** Bumped by discardInFlight(); tasks spawned under an older value drop their result */
  private _generation = 0

  constructor(options: ExecutionEngineOptions) {
    this._completed = options.completed
    this._logger = options.logger ?? console
    this._prefix = options.name ? `[${options.name}] ` : ''
    this._quiet = options.quiet ?? false
    this.defaultTimeout = DispatchTimeoutSchema.parse(options.defaultTimeout ?? null)
  }

  /** Number of spawned async tasks that have not queued their result yet */
  get inFlight(): number {
    return this._inFlight.size
  }

  async execute(
    event: LoopEvent,
    registry: HandlerRegistry,
    options: DispatchOptions = {}
  ): Promise<ExecutionOutcome> {
    if (options.timeout !== undefined) {
      DispatchTimeoutSchema.parse(options.timeout)
    }

    const handler = registry.lookup(event.key)
    if (!handler) {
      this._info(`No handler found for ${event.key}`)
      return { status: 'skipped' }
    }

    if (event.mode === EventMode.SYNC) {
      const result = await this._runHandler(event, handler, options)
      return { status: 'completed', result }
    }

    return { status: 'deferred', task: this._spawn(event, handler, options) }
  }

  /**
   * Detach every task spawned so far: they run to completion, but their
   * results are not queued.
   */
  discardInFlight(): void {
    this._generation++
  }

  /** Resolve once every async task spawned so far (and any they overlap with) has settled */
  async waitForInFlight(): Promise<void> {
    while (this._inFlight.size > 0) {
      await Promise.all(this._inFlight)
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private _spawn(event: LoopEvent, handler: Handler, options: DispatchOptions): Promise<void> {
    const task: Promise<void> = this._runTask(event, handler, options)
      .catch((err: unknown) => {
        this._logger.error(`${this._prefix}Async task for ${event} failed to queue its result`, err)
      })
      .finally(() => {
        this._inFlight.delete(task)
      })
    this._inFlight.add(task)
    return task
  }

  private async _runTask(event: LoopEvent, handler: Handler, options: DispatchOptions): Promise<void> {
    const generation = this._generation
    await nextMacrotask()
    const result = await this._runHandler(event, handler, options)
    if (generation !== this._generation) {
      this._info(`Discarding result for ${event.key}, its loop was cleared`)
      return
    }
    await this._completed.enqueue(result)
  }

  private async _runHandler(
    event: LoopEvent,
    handler: Handler,
    options: DispatchOptions
  ): Promise<EventResult> {
    const timeout = options.timeout !== undefined ? options.timeout : this.defaultTimeout
    const controller = new AbortController()
    const context: HandlerContext = {
      key: event.key,
      event_id: event.event_id,
      mode: event.mode,
      signal: controller.signal,
    }

    const startedAt = nowISO()
    const t0 = performance.now()
    let output: string
    try {
      if (options.signal?.aborted) {
        throw this._abortedError(event, options.signal)
      }
      const work = Promise.resolve(handler(event.payload, context))
      output = await this._withLimits(event, work, controller, timeout, options.signal)
    } catch (err) {
      output = describeError(err)
    }

    return new EventResult({
      event_id: event.event_id,
      key: event.key,
      result: output,
      mode: event.mode,
      started_at: startedAt,
      completed_at: nowISO(),
      duration_ms: elapsedMs(t0),
    })
  }

  /**
   * Race the handler against the dispatch timeout and abort signal.
   * Whichever fires first also aborts the handler's context signal.
   */
  private _withLimits(
    event: LoopEvent,
    work: Promise<string>,
    controller: AbortController,
    timeout: number | null,
    signal: AbortSignal | undefined
  ): Promise<string> {
    if (timeout === null && signal === undefined) {
      return work
    }

    return new Promise<string>((resolve, reject) => {
      let timeoutId: ReturnType<typeof setTimeout> | undefined

      const cleanup = () => {
        if (timeoutId !== undefined) clearTimeout(timeoutId)
        signal?.removeEventListener('abort', onAbort)
      }

      const fail = (error: Error) => {
        cleanup()
        controller.abort(error)
        reject(error)
      }

      const onAbort = () => {
        if (signal) fail(this._abortedError(event, signal))
      }

      if (timeout !== null) {
        timeoutId = setTimeout(() => {
          fail(
            new HandlerTimeoutError(`Handler for ${event.key} timed out after ${timeout}s`, {
              key: event.key,
              timeout_seconds: timeout,
            })
          )
        }, timeout * 1000)
      }
      signal?.addEventListener('abort', onAbort, { once: true })

      work.then(
        (value) => {
          cleanup()
          resolve(value)
        },
        (error: unknown) => {
          cleanup()
          reject(error)
        }
      )
    })
  }

  private _abortedError(event: LoopEvent, signal: AbortSignal): HandlerAbortedError {
    const reason: unknown = signal.reason
    const detail = reason instanceof Error ? `: ${reason.message}` : ''
    return new HandlerAbortedError(`Handler for ${event.key} was aborted${detail}`, {
      key: event.key,
      cause: reason,
    })
  }

  private _info(message: string): void {
    if (!this._quiet) this._logger.info(`${this._prefix}${message}`)
  }
}
