import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { ZodError } from 'zod'
import {
  ConsoleOutputSink,
  EventLoop,
  EventMode,
  LoopEvent,
  MemoryOutputSink,
  createDeferred,
  type DispatchOptions,
  type OutputSink,
} from '../src/index.js'

describe('EventLoop', () => {
  let loop: EventLoop
  let sink: MemoryOutputSink
  let logger: { info: ReturnType<typeof vi.fn>; warn: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> }

  beforeEach(() => {
    sink = new MemoryOutputSink()
    logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() }
    loop = new EventLoop({ name: 'TestLoop', sink, logger })
  })

  afterEach(async () => {
    await loop.stop({ clear: true })
  })

  describe('basic submit and tick', () => {
    it('should return an empty report when there is nothing to do', async () => {
      const report = await loop.tick()

      expect(report).toEqual({ dispatched: null, outcome: null, blocked_ms: null, drained: null })
      expect(loop.tickCount).toBe(1)
    })

    it('should chain on() and submit() and deliver a sync result', async () => {
      const event = loop
        .on('hello-0', (data) => `Hello! ${data}`)
        .submit({ key: 'hello-0', payload: 'How are you doing today?' })

      const report = await loop.tick()

      expect(report.dispatched).toBe(event)
      expect(report.outcome?.status).toBe('completed')
      expect(sink.values).toEqual(['Hello! How are you doing today?'])
      expect(sink.results[0]?.event_id).toBe(event.event_id)
    })

    it('should accept a prebuilt LoopEvent', async () => {
      const event = new LoopEvent({ key: 'echo', payload: 'same', mode: EventMode.ASYNC })
      loop.register('echo', (data) => data)

      expect(loop.submit(event)).toBe(event)
      expect(loop.pendingEvents).toEqual([event])
    })

    it('should deliver an async result on a later tick', async () => {
      loop.on('later', async (data) => data.toUpperCase()).submit({
        key: 'later',
        payload: 'async',
        mode: EventMode.ASYNC,
      })

      const first = await loop.tick()
      expect(first.drained).toBeNull()

      await loop.waitUntilIdle()
      const second = await loop.tick()

      expect(second.dispatched).toBeNull()
      expect(second.drained?.result).toBe('ASYNC')
      expect(sink.values).toEqual(['ASYNC'])
    })

    it('should keep the dispatch options given at submit time', async () => {
      const options: DispatchOptions = { timeout: 0.05 }
      loop.on('stuck', () => new Promise<string>(() => {})).submit({ key: 'stuck' }, options)

      options.timeout = -1
      await loop.tick()

      expect(sink.values).toEqual(['Error: Handler for stuck timed out after 0.05s'])
    })

    it('should reject an invalid dispatch timeout', () => {
      loop.register('k', () => 'v')

      expect(() => loop.submit({ key: 'k' }, { timeout: -1 })).toThrow(ZodError)
      expect(loop.pendingCount).toBe(0)
    })
  })

  describe('logging', () => {
    it('should log the received key and the blocked time', async () => {
      loop.on('k', () => 'v').submit({ key: 'k' })
      await loop.tick()

      expect(logger.info).toHaveBeenCalledTimes(2)
      expect(logger.info).toHaveBeenNthCalledWith(1, '[TestLoop] Received Event: k')
      expect(logger.info).toHaveBeenNthCalledWith(
        2,
        expect.stringMatching(/^\[TestLoop\] Event loop was blocked for \d+ ms due to this operation$/)
      )
    })

    it('should not log informational messages when quiet', async () => {
      const quietLoop = new EventLoop({ name: 'QuietLoop', sink, logger, quiet: true })
      quietLoop.submit({ key: 'missing' })
      await quietLoop.tick()

      expect(logger.info).not.toHaveBeenCalled()
    })

    it('should warn when stopping with tasks still running', async () => {
      loop.on('forever', () => new Promise<string>(() => {})).submit({ key: 'forever', mode: EventMode.ASYNC })
      await loop.tick()

      await loop.stop({ timeout: 0.05 })

      expect(logger.warn).toHaveBeenCalledWith(
        '[TestLoop] Stopping with 1 async task(s) still running after 0.05s'
      )
    })
  })

  describe('output sink', () => {
    it('should print through ConsoleOutputSink', async () => {
      const out = { log: vi.fn() }
      const consoleLoop = new EventLoop({ name: 'ConsoleLoop', sink: new ConsoleOutputSink(out), logger })

      consoleLoop.on('k', () => 'v').submit({ key: 'k' })
      await consoleLoop.tick()

      expect(out.log).toHaveBeenCalledWith('Output for Event "k": v\n')
    })

    it('should let a failing sink propagate out of tick', async () => {
      const broken: OutputSink = {
        emit() {
          throw new Error('sink broken')
        },
      }
      const brokenLoop = new EventLoop({ name: 'BrokenLoop', sink: broken, logger })

      brokenLoop.on('k', () => 'v').submit({ key: 'k' })

      await expect(brokenLoop.tick()).rejects.toThrow('sink broken')
      expect(brokenLoop.pendingCount).toBe(0)
    })
  })

  describe('driving', () => {
    it('should run until idle, waiting on async tasks', async () => {
      const gate = createDeferred<void>()
      loop.on('gated', async () => {
        await gate.promise
        return 'opened'
      })
      loop.on('plain', () => 'plain')
      loop.submit({ key: 'gated', mode: EventMode.ASYNC })
      loop.submit({ key: 'plain' })

      const running = loop.runUntilIdle()
      setTimeout(() => gate.resolve(), 20)
      const ticks = await running

      // tick 1 spawns gated, tick 2 runs plain, tick 3 drains gated
      expect(ticks).toBe(3)
      expect(sink.values).toEqual(['plain', 'opened'])
      expect(loop.isIdle).toBe(true)
    })

    it('should stop after maxTicks', async () => {
      loop.register('k', () => 'v')
      for (let i = 0; i < 5; i++) loop.submit({ key: 'k' })

      const ticks = await loop.runUntilIdle({ maxTicks: 2 })

      expect(ticks).toBe(2)
      expect(loop.pendingCount).toBe(3)
    })

    it('should stop at empty queues without waiting on tasks when asked', async () => {
      loop.on('forever', () => new Promise<string>(() => {})).submit({ key: 'forever', mode: EventMode.ASYNC })
      loop.on('k', () => 'v').submit({ key: 'k' })

      const ticks = await loop.runUntilIdle({ waitForTasks: false })

      expect(ticks).toBe(2)
      expect(sink.values).toEqual(['v'])
      expect(loop.inFlightCount).toBe(1)
    })

    it('should report a timeout from waitUntilIdle', async () => {
      loop.on('forever', () => new Promise<string>(() => {})).submit({ key: 'forever', mode: EventMode.ASYNC })
      await loop.tick()

      expect(await loop.waitUntilIdle(0.05)).toBe(false)
      expect(loop.inFlightCount).toBe(1)
    })
  })

  describe('lifecycle', () => {
    it('should clear queues and handlers on stop', async () => {
      loop.register('k', () => 'v')
      loop.submit({ key: 'k' })

      await loop.stop({ clear: true })

      expect(loop.pendingCount).toBe(0)
      expect(loop.handlers.size).toBe(0)
    })

    it('should drop results of tasks still running when stopped with clear', async () => {
      const gate = createDeferred<void>()
      loop
        .on('late', async () => {
          await gate.promise
          return 'late'
        })
        .submit({ key: 'late', mode: EventMode.ASYNC })
      await loop.tick()

      await loop.stop({ clear: true })
      gate.resolve()
      await loop.waitUntilIdle()
      const report = await loop.tick()

      expect(report.drained).toBeNull()
      expect(loop.completedCount).toBe(0)
      expect(sink.values).toEqual([])
      expect(logger.info).toHaveBeenCalledWith('[TestLoop] Discarding result for late, its loop was cleared')
    })

    it('should deliver tasks spawned after a clear', async () => {
      await loop.stop({ clear: true })

      loop.on('again', async () => 'again').submit({ key: 'again', mode: EventMode.ASYNC })
      await loop.runUntilIdle()

      expect(sink.values).toEqual(['again'])
    })

    it('should describe its state in toString', () => {
      loop.register('k', () => 'v')
      loop.submit({ key: 'k' })

      expect(loop.toString()).toBe('TestLoop(⏳ 1 | ▶ 0 | ✅ 0 -> 1 handlers)')
    })

    it('should generate a name when none is given', () => {
      const unnamed = new EventLoop({ sink, logger })

      expect(unnamed.name).toBe(`EventLoop_${unnamed.id.slice(-8)}`)
    })
  })
})
