/**
 * CLI configuration, read from environment variables and validated with Zod.
 */

import { z } from 'zod'

import { DEFAULT_API_BASE_URL } from './collaborators/remote-fetcher.js'
import { MAX_TIMEOUT_SECONDS } from './schemas.js'

const CliConfigSchema = z.object({
  file_path: z.string().min(1).default('hello.txt'),
  api_base_url: z.string().url().default(DEFAULT_API_BASE_URL),
  record_id: z.string().min(1).default('2'),
  handler_timeout: z.coerce.number().positive().max(MAX_TIMEOUT_SECONDS).nullable().default(null),
})

export type CliConfig = z.infer<typeof CliConfigSchema>

/** Blank variables count as unset */
function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim()
  return value ? value : undefined
}

/**
 * Build the CLI config.
 *
 * - TICKLOOP_FILE_PATH: file read by the "read file" task (default hello.txt)
 * - TICKLOOP_API_BASE_URL: API root for the "fetch" task
 * - TICKLOOP_RECORD_ID: record fetched by the "fetch" task (default 2)
 * - TICKLOOP_HANDLER_TIMEOUT: seconds before any handler is abandoned
 */
export function loadCliConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  return CliConfigSchema.parse({
    file_path: envValue(env, 'TICKLOOP_FILE_PATH'),
    api_base_url: envValue(env, 'TICKLOOP_API_BASE_URL'),
    record_id: envValue(env, 'TICKLOOP_RECORD_ID'),
    handler_timeout: envValue(env, 'TICKLOOP_HANDLER_TIMEOUT'),
  })
}
