/**
 * Output sinks consume one EventResult at a time.
 *
 * A sink is assumed never to fail; if emit() throws, the error propagates out
 * of EventLoop.tick() and is not retried.
 */

import type { EventResult } from './event-result.js'

export interface OutputSink {
  emit(result: EventResult): void
}

/** Prints `Output for Event "<key>": <result>` followed by a blank line */
export class ConsoleOutputSink implements OutputSink {
  constructor(private readonly out: Pick<Console, 'log'> = console) {}

  emit(result: EventResult): void {
    this.out.log(`Output for Event ${JSON.stringify(result.key)}: ${result.result}\n`)
  }
}

/** Keeps every emitted result in memory, in emit order */
export class MemoryOutputSink implements OutputSink {
  readonly results: EventResult[] = []

  emit(result: EventResult): void {
    this.results.push(result)
  }

  /** Result strings in emit order */
  get values(): string[] {
    return this.results.map((r) => r.result)
  }

  clear(): void {
    this.results.length = 0
  }
}
