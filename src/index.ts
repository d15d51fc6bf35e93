/**
 * tickloop - Minimal cooperative event loop for TypeScript
 *
 * Submit work under a handler key, run it synchronously (awaited inside the
 * tick) or asynchronously (spawned, result queued), and advance one tick at
 * a time.
 *
 * @example
 * ```typescript
 * import { EventLoop, MemoryOutputSink } from 'tickloop'
 *
 * const sink = new MemoryOutputSink()
 * const loop = new EventLoop({ name: 'MyLoop', sink })
 *
 * loop.on('hello-0', (data) => `Hello! ${data}`)
 * loop.submit({ key: 'hello-0', payload: 'How are you doing today?', mode: 'sync' })
 *
 * const report = await loop.tick()
 * console.log(report.blocked_ms)  // time the tick spent running the handler
 * console.log(sink.values)        // ['Hello! How are you doing today?']
 * ```
 */

// Core classes
export { EventLoop, type EventLoopOptions, type TickReport } from './event-loop.js'
export { LoopEvent, type LoopEventInit } from './loop-event.js'
export { EventResult, type EventResultOptions } from './event-result.js'
export { HandlerRegistry } from './handler-registry.js'
export { FifoQueue, CompletedQueue } from './queues.js'
export {
  ExecutionEngine,
  type ExecutionEngineOptions,
  type ExecutionOutcome,
} from './execution-engine.js'
export { ConsoleOutputSink, MemoryOutputSink, type OutputSink } from './output-sink.js'
export { AsyncSemaphore, runWithSemaphore } from './locks.js'
export { TickloopError, HandlerTimeoutError, HandlerAbortedError } from './errors.js'

// Schemas
export {
  // Validators
  UUIDStr,
  EventKeyStr,
  DateTimeStr,
  DispatchTimeoutSchema,
  MAX_TIMEOUT_SECONDS,

  // Mode
  EventMode,
  EventModeSchema,

  // Event schemas
  LoopEventSchema,
  EventResultSchema,

  // Types
  type LoopEventData,
  type EventResultData,
  type Handler,
  type HandlerContext,
  type DispatchOptions,
  type LoopLogger,
} from './schemas.js'

// Collaborators
export * from './collaborators/index.js'
export { loadCliConfig, type CliConfig } from './config.js'

// Utilities
export {
  generateUUID7,
  nowISO,
  createDeferred,
  sleep,
  nextMacrotask,
  elapsedMs,
  describeError,
  generateUniqueEventKey,
  EventKeySequence,
  type Deferred,
} from './utils.js'
