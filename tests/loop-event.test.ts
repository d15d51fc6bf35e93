import { describe, it, expect } from 'vitest'
import { ZodError } from 'zod'
import { EventMode, EventResult, LoopEvent } from '../src/index.js'

describe('LoopEvent', () => {
  it('should apply defaults', () => {
    const event = new LoopEvent({ key: 'hello-0' })

    expect(event.payload).toBe('')
    expect(event.mode).toBe(EventMode.SYNC)
    expect(event.isAsync).toBe(false)
    expect(event.event_id).toMatch(/^[0-9a-f-]{36}$/)
    expect(Date.parse(event.event_created_at)).not.toBeNaN()
  })

  it('should be frozen once constructed', () => {
    const event = new LoopEvent({ key: 'k', payload: 'p', mode: EventMode.ASYNC })

    expect(Object.isFrozen(event)).toBe(true)
    expect(() => Object.assign(event, { payload: 'changed' })).toThrow(TypeError)
    expect(event.payload).toBe('p')
  })

  it('should reject an empty key', () => {
    expect(() => new LoopEvent({ key: '' })).toThrow(ZodError)
  })

  it('should reject an unknown mode from JSON', () => {
    expect(() =>
      LoopEvent.fromJSON({
        event_id: '0190a6b2-7c1d-7f00-8000-000000000001',
        key: 'k',
        payload: '',
        mode: 'later',
        event_created_at: '2024-01-01T00:00:00.000Z',
      })
    ).toThrow(ZodError)
  })

  it('should restore an event from its JSON form', () => {
    const event = new LoopEvent({ key: 'read-file-1', payload: 'hello.txt', mode: EventMode.ASYNC })

    const restored = LoopEvent.fromJSON(JSON.stringify(event))

    expect(restored.toJSON()).toEqual(event.toJSON())
  })

  it('should describe itself', () => {
    const event = new LoopEvent({
      key: 'hello-0',
      event_id: '0190a6b2-7c1d-7f00-8000-00000000beef',
    })

    expect(event.toString()).toBe('hello-0#beef [sync]')
  })
})

describe('EventResult', () => {
  const data = {
    event_id: '0190a6b2-7c1d-7f00-8000-000000000002',
    key: 'fetch-from-api-2',
    result: 'Fetched post from API: {}',
    mode: EventMode.ASYNC,
    started_at: '2024-01-01T00:00:00.000Z',
    completed_at: '2024-01-01T00:00:00.250Z',
    duration_ms: 250,
  }

  it('should serialize its fields', () => {
    expect(new EventResult(data).toJSON()).toEqual(data)
  })

  it('should validate when parsed from JSON', () => {
    expect(EventResult.fromJSON(data).key).toBe('fetch-from-api-2')
    expect(() => EventResult.fromJSON({ ...data, duration_ms: -1 })).toThrow(ZodError)
  })

  it('should describe itself', () => {
    expect(new EventResult(data).toString()).toBe(
      'fetch-from-api-2() -> Fetched post from API: {} (async, 250ms)'
    )
  })
})
