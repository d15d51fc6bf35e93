/**
 * Headless usage: sync vs async dispatch, driven tick by tick
 */

import { EventKeySequence, EventLoop, EventMode, sleep } from '../src/index.js'

const loop = new EventLoop({ name: 'Example' })
const keys = new EventKeySequence()

// A slow handler: 200ms of simulated I/O
const slowUpper = async (data: string) => {
  await sleep(200)
  return data.toUpperCase()
}

// Sync: the tick awaits the handler, so it reports ~200ms blocked
const syncKey = keys.next('upper')
loop.on(syncKey, slowUpper).submit({ key: syncKey, payload: 'sync work', mode: EventMode.SYNC })
const syncReport = await loop.tick()
console.log(`sync tick blocked for ${syncReport.blocked_ms}ms`)

// Async: the tick only spawns the task, the result is drained on a later tick
const asyncKey = keys.next('upper')
loop.on(asyncKey, slowUpper).submit({ key: asyncKey, payload: 'async work', mode: EventMode.ASYNC })
const asyncReport = await loop.tick()
console.log(`async tick blocked for ${asyncReport.blocked_ms}ms`)

// Unregistered keys are skipped, not errors
loop.submit({ key: 'nobody-listens', payload: '' })

const ticks = await loop.runUntilIdle()
console.log(`drained everything in ${ticks} more tick(s): ${loop}`)
