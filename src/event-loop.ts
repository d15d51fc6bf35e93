/**
 * EventLoop - cooperative scheduler driven one tick at a time
 *
 * Features:
 * - Register handlers by key, submit events, advance with tick()
 * - FIFO dispatch of pending events, one per tick
 * - Sync events are awaited inside the tick, async events run as spawned tasks
 * - Async results drain in completion order, one per tick
 */

import { CompletedQueue, FifoQueue } from './queues.js'
import type { EventResult } from './event-result.js'
import { ExecutionEngine, type ExecutionOutcome } from './execution-engine.js'
import { HandlerRegistry } from './handler-registry.js'
import { LoopEvent, type LoopEventInit } from './loop-event.js'
import { ConsoleOutputSink, type OutputSink } from './output-sink.js'
import {
  DispatchTimeoutSchema,
  type DispatchOptions,
  type Handler,
  type LoopLogger,
} from './schemas.js'
import { elapsedMs, generateUUID7 } from './utils.js'

// =============================================================================
// Types
// =============================================================================

export interface EventLoopOptions {
  /** Optional name used to prefix log lines (auto-generated if not provided) */
  name?: string
  /** Where results are delivered (default: ConsoleOutputSink) */
  sink?: OutputSink
  /** Where diagnostics go (default: console) */
  logger?: LoopLogger
  /** Default handler timeout in seconds for every dispatch (default: null = none) */
  handlerTimeout?: number | null
  /** Suppress informational logs (default: false) */
  quiet?: boolean
}

/** What a single tick did */
export interface TickReport {
  /** Event taken off the pending queue, if any */
  dispatched: LoopEvent | null
  /** How the dispatched event was executed */
  outcome: ExecutionOutcome | null
  /** Time the tick spent inside execute() for the dispatched event */
  blocked_ms: number | null
  /** Result taken off the completed queue, if any */
  drained: EventResult | null
}

interface PendingDispatch {
  event: LoopEvent
  options: DispatchOptions
}

// =============================================================================
// EventLoop
// =============================================================================

/**
 * @example
 * ```typescript
 * const loop = new EventLoop({ name: 'Demo' })
 *
 * loop.on('hello-0', (data) => `Hello! ${data}`).submit({
 *   key: 'hello-0',
 *   payload: 'How are you doing today?',
 *   mode: 'async',
 * })
 *
 * await loop.tick() // dispatches hello-0 without waiting for it
 * await loop.waitUntilIdle()
 * await loop.tick() // drains the result into the sink
 * ```
 */
export class EventLoop {
  readonly id: string
  readonly name: string
  readonly sink: OutputSink
  readonly handlers: HandlerRegistry = new HandlerRegistry()

  private readonly _logger: LoopLogger
  private readonly _quiet: boolean
  private readonly _engine: ExecutionEngine
  private _pending: FifoQueue<PendingDispatch> = new FifoQueue()
  private _completed: CompletedQueue = new CompletedQueue()
  private _tickCount = 0

  constructor(options: EventLoopOptions = {}) {
    this.id = generateUUID7()
    this.name = options.name ?? `EventLoop_${this.id.slice(-8)}`
    this.sink = options.sink ?? new ConsoleOutputSink()
    this._logger = options.logger ?? console
    this._quiet = options.quiet ?? false

    this._engine = new ExecutionEngine({
      completed: this._completed,
      logger: this._logger,
      name: this.name,
      defaultTimeout: DispatchTimeoutSchema.parse(options.handlerTimeout ?? null),
      quiet: this._quiet,
    })
  }

  // ===========================================================================
  // Properties
  // ===========================================================================

  /** Events submitted but not yet dispatched */
  get pendingCount(): number {
    return this._pending.size
  }

  /** Async results waiting to be drained */
  get completedCount(): number {
    return this._completed.size
  }

  /** Async tasks still running */
  get inFlightCount(): number {
    return this._engine.inFlight
  }

  get tickCount(): number {
    return this._tickCount
  }

  /** Snapshot of pending events, oldest first */
  get pendingEvents(): LoopEvent[] {
    return this._pending.toArray().map((entry) => entry.event)
  }

  get isIdle(): boolean {
    return this._pending.isEmpty && this._completed.isEmpty && this._engine.inFlight === 0
  }

  // ===========================================================================
  // Handler Registration
  // ===========================================================================

  /**
   * Register handler under key, replacing any previous handler for it.
   * Returns the loop so a submit can be chained.
   */
  on(key: string, handler: Handler): this {
    this.handlers.register(key, handler)
    return this
  }

  register(key: string, handler: Handler): void {
    this.handlers.register(key, handler)
  }

  // ===========================================================================
  // Submission
  // ===========================================================================

  /**
   * Queue an event for dispatch on a later tick.
   *
   * @param options - Per-dispatch timeout (seconds) and abort signal
   * @returns The frozen event as queued
   */
  submit(event: LoopEvent | LoopEventInit, options: DispatchOptions = {}): LoopEvent {
    const loopEvent = event instanceof LoopEvent ? event : new LoopEvent(event)
    const dispatch: DispatchOptions = { ...options }
    if (dispatch.timeout !== undefined) {
      DispatchTimeoutSchema.parse(dispatch.timeout)
    }
    this._pending.enqueue({ event: loopEvent, options: dispatch })
    return loopEvent
  }

  // ===========================================================================
  // Ticking
  // ===========================================================================

  /**
   * Advance the loop by one step: dispatch at most one pending event, then
   * drain at most one completed result. Never waits on async tasks.
   */
  async tick(): Promise<TickReport> {
    this._tickCount++
    const report: TickReport = { dispatched: null, outcome: null, blocked_ms: null, drained: null }

    const next = this._pending.dequeue()
    if (next) {
      const { event, options } = next
      this._info(`Received Event: ${event.key}`)

      const startedAt = performance.now()
      const outcome = await this._engine.execute(event, this.handlers, options)
      const blockedMs = elapsedMs(startedAt)

      report.dispatched = event
      report.outcome = outcome
      report.blocked_ms = blockedMs

      if (outcome.status !== 'skipped') {
        this._info(`Event loop was blocked for ${Math.round(blockedMs)} ms due to this operation`)
      }
      if (outcome.status === 'completed') {
        this.sink.emit(outcome.result)
      }
    }

    const drained = await this._completed.dequeue()
    if (drained) {
      report.drained = drained
      this.sink.emit(drained)
    }

    return report
  }

  /**
   * Tick until nothing is pending, queued or in flight, waiting on async
   * tasks whenever they are the only work left. With `waitForTasks: false`
   * it stops once both queues are empty instead.
   *
   * @returns The number of ticks performed
   */
  async runUntilIdle(options: { maxTicks?: number; waitForTasks?: boolean } = {}): Promise<number> {
    const maxTicks = options.maxTicks ?? Infinity
    const waitForTasks = options.waitForTasks ?? true
    let ticks = 0

    while (ticks < maxTicks) {
      if (this._pending.isEmpty && this._completed.isEmpty) {
        if (!waitForTasks || this._engine.inFlight === 0) break
        await this._engine.waitForInFlight()
        continue
      }
      await this.tick()
      ticks++
    }

    return ticks
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Wait until every spawned async task has queued its result.
   *
   * @param timeout - Seconds to wait at most
   * @returns false if the timeout elapsed first
   */
  async waitUntilIdle(timeout?: number): Promise<boolean> {
    if (timeout === undefined) {
      await this._engine.waitForInFlight()
      return true
    }

    let timeoutId: ReturnType<typeof setTimeout> | undefined
    const timedOut = new Promise<false>((resolve) => {
      timeoutId = setTimeout(() => resolve(false), timeout * 1000)
    })
    try {
      return await Promise.race([this._engine.waitForInFlight().then(() => true as const), timedOut])
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Stop the loop, first waiting up to `timeout` seconds for spawned tasks.
   * With `clear` the queues and handler registry are emptied and tasks still
   * running are detached: they finish, but their results are dropped.
   */
  async stop(options: { timeout?: number; clear?: boolean } = {}): Promise<void> {
    const { timeout, clear = false } = options

    if (timeout !== undefined && timeout > 0) {
      const idle = await this.waitUntilIdle(timeout)
      if (!idle) {
        this._logger.warn(
          `[${this.name}] Stopping with ${this._engine.inFlight} async task(s) still running after ${timeout}s`
        )
      }
    }

    if (clear) {
      this._engine.discardInFlight()
      this._pending.clear()
      await this._completed.clear()
      this.handlers.clear()
    }
  }

  // ===========================================================================
  // Utilities
  // ===========================================================================

  private _info(message: string): void {
    if (!this._quiet) this._logger.info(`[${this.name}] ${message}`)
  }

  toString(): string {
    return `${this.name}(${String.fromCodePoint(0x23f3)} ${this.pendingCount} | ${String.fromCodePoint(0x25b6)} ${this.inFlightCount} | ${String.fromCodePoint(0x2705)} ${this.completedCount} -> ${this.handlers.size} handlers)`
  }
}
