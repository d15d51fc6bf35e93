/**
 * Interactive menu logic: choice parsing and turning a choice into a
 * key/handler/event submission. Kept free of I/O so it can be tested
 * without a terminal.
 */

import type { CliConfig } from './config.js'
import type { EventLoop } from './event-loop.js'
import { EventMode, type Handler } from './schemas.js'
import type { EventKeySequence } from './utils.js'

export const MenuChoice = {
  HELLO: '1',
  READ_FILE: '2',
  FETCH_RECORD: '3',
  PRINT_OUTPUT: '4',
  EXIT: '5',
} as const

export type MenuChoice = (typeof MenuChoice)[keyof typeof MenuChoice]

const MENU_CHOICES: readonly string[] = Object.values(MenuChoice)

export const MAIN_MENU = [
  'What kind of task would you like to submit to the Event Loop?',
  ' 1. Wish me Hello',
  ' 2. Print the contents of a file',
  ' 3. Retrieve data from API & print it',
  ' 4. Print output of previously submitted Async task',
  ' 5. Exit!',
].join('\n')

export const MODE_MENU = [
  'How would you like to execute this operation?',
  ' 1. Synchronously (this would block the Event Loop until the operation completes)',
  " 2. Asynchronously (this won't block Event Loop in any way)",
].join('\n')

export const HELLO_PAYLOAD = 'How are you doing today?'

/** Seconds Exit waits for outstanding async tasks */
export const EXIT_FLUSH_TIMEOUT_SECONDS = 5

function isMenuChoice(value: string): value is MenuChoice {
  return MENU_CHOICES.includes(value)
}

/** The menu choice typed by the user, or null when the input is not one */
export function parseMenuChoice(input: string): MenuChoice | null {
  const trimmed = input.trim()
  return isMenuChoice(trimmed) ? trimmed : null
}

/** '1' is sync, '2' is async, anything else is invalid */
export function parseModeChoice(input: string): EventMode | null {
  switch (input.trim()) {
    case '1':
      return EventMode.SYNC
    case '2':
      return EventMode.ASYNC
    default:
      return null
  }
}

/** Whether a choice submits new work (and so needs an execution mode) */
export function choiceNeedsMode(choice: MenuChoice): boolean {
  return choice === MenuChoice.HELLO || choice === MenuChoice.READ_FILE || choice === MenuChoice.FETCH_RECORD
}

export function greet(data: string): string {
  return `Hello! ${data}`
}

export interface MenuCollaborators {
  readFile: Handler
  fetchRecord: Handler
}

export interface Submission {
  key: string
  handler: Handler
  payload: string
  mode: EventMode
}

/**
 * Work to submit for a menu choice, with a fresh key from keys.
 * Returns null for choices that only tick or exit.
 */
export function buildSubmission(
  choice: MenuChoice,
  mode: EventMode,
  keys: EventKeySequence,
  collaborators: MenuCollaborators,
  config: Pick<CliConfig, 'file_path' | 'record_id'>
): Submission | null {
  switch (choice) {
    case MenuChoice.HELLO:
      return { key: keys.next('hello'), handler: greet, payload: HELLO_PAYLOAD, mode }
    case MenuChoice.READ_FILE:
      return { key: keys.next('read-file'), handler: collaborators.readFile, payload: config.file_path, mode }
    case MenuChoice.FETCH_RECORD:
      return {
        key: keys.next('fetch-from-api'),
        handler: collaborators.fetchRecord,
        payload: config.record_id,
        mode,
      }
    case MenuChoice.PRINT_OUTPUT:
    case MenuChoice.EXIT:
      return null
  }
}

/**
 * Deliver what async work can still finish before exiting. Waits at most
 * `timeout` seconds for running tasks, then drains the queues without waiting
 * again; tasks that never settle are left behind.
 */
export async function flushOnExit(
  loop: EventLoop,
  timeout: number = EXIT_FLUSH_TIMEOUT_SECONDS,
  out: Pick<Console, 'log'> = console
): Promise<number> {
  if (loop.isIdle) return 0

  out.log(`Flushing ${loop.inFlightCount + loop.completedCount} outstanding async result(s)...`)
  await loop.stop({ timeout })
  return loop.runUntilIdle({ waitForTasks: false })
}
