/**
 * Errors raised inside the execution engine.
 *
 * These never reach the scheduler: the engine catches them and encodes them
 * into the EventResult's result string.
 */

export class TickloopError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class HandlerTimeoutError extends TickloopError {
  readonly key: string
  readonly timeout_seconds: number

  constructor(message: string, params: { key: string; timeout_seconds: number }) {
    super(message)
    this.key = params.key
    this.timeout_seconds = params.timeout_seconds
  }
}

export class HandlerAbortedError extends TickloopError {
  readonly key: string

  constructor(message: string, params: { key: string; cause?: unknown }) {
    super(message, { cause: params.cause })
    this.key = params.key
  }
}
