#!/usr/bin/env node
/**
 * Interactive driver: collects a task from the menu, submits it to the event
 * loop and performs one tick per menu round.
 */

import * as readline from 'node:readline'

import { createFileContentProvider } from './collaborators/file-provider.js'
import { createRemoteRecordFetcher } from './collaborators/remote-fetcher.js'
import { loadCliConfig } from './config.js'
import { EventLoop } from './event-loop.js'
import {
  MAIN_MENU,
  MODE_MENU,
  MenuChoice,
  buildSubmission,
  choiceNeedsMode,
  flushOnExit,
  parseMenuChoice,
  parseModeChoice,
} from './menu.js'
import { EventMode } from './schemas.js'
import { EventKeySequence } from './utils.js'

function promptForLine(rl: readline.Interface, prompt: string): Promise<string> {
  return new Promise<string>((resolve) => {
    rl.question(prompt, (answer: string) => {
      resolve(answer.trim())
    })
  })
}

async function promptUntilValid<T>(
  rl: readline.Interface,
  menu: string,
  parse: (input: string) => T | null,
  invalidMessage: string
): Promise<T> {
  for (;;) {
    console.log(menu)
    const parsed = parse(await promptForLine(rl, ' > '))
    if (parsed !== null) return parsed
    console.log(invalidMessage)
  }
}

async function main(): Promise<void> {
  const config = loadCliConfig()
  const loop = new EventLoop({ name: 'tickloop', handlerTimeout: config.handler_timeout })
  const keys = new EventKeySequence()
  const collaborators = {
    readFile: createFileContentProvider(),
    fetchRecord: createRemoteRecordFetcher({ baseUrl: config.api_base_url }),
  }

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  })

  try {
    for (;;) {
      const choice = await promptUntilValid(
        rl,
        MAIN_MENU,
        parseMenuChoice,
        'Invalid input. Please select a valid option (1-5).'
      )
      if (choice === MenuChoice.EXIT) break

      const mode = choiceNeedsMode(choice)
        ? await promptUntilValid(
            rl,
            MODE_MENU,
            parseModeChoice,
            'Invalid input. Please select a valid option (1 or 2).'
          )
        : EventMode.SYNC

      const submission = buildSubmission(choice, mode, keys, collaborators, config)
      if (submission) {
        loop.on(submission.key, submission.handler).submit({
          key: submission.key,
          payload: submission.payload,
          mode: submission.mode,
        })
      }
      await loop.tick()
    }
  } finally {
    rl.close()
  }

  await flushOnExit(loop)
}

// exits even with tasks still pending
main().then(
  () => process.exit(0),
  (err: unknown) => {
    console.error(err)
    process.exit(1)
  }
)
