/**
 * File-content provider handler: reads a file, creating it with placeholder
 * content when it does not exist yet. Never throws; I/O failures come back
 * as an error-description string.
 */

import { readFile, writeFile } from 'node:fs/promises'

import type { Handler } from '../schemas.js'

export const DEFAULT_PLACEHOLDER = 'New file created'

export interface FileContentProviderOptions {
  /** Content written into files that do not exist (default: 'New file created') */
  placeholder?: string
}

function errorCode(err: unknown): unknown {
  return err instanceof Error && 'code' in err ? err.code : undefined
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export async function readFileOrCreate(
  path: string,
  placeholder: string = DEFAULT_PLACEHOLDER
): Promise<string> {
  try {
    return await readFile(path, 'utf-8')
  } catch (err) {
    if (errorCode(err) !== 'ENOENT') {
      return `Error reading file: ${errorMessage(err)}`
    }
  }

  try {
    // wx: if another task created it in the meantime, keep what it wrote
    await writeFile(path, placeholder, { encoding: 'utf-8', flag: 'wx' })
  } catch (err) {
    if (errorCode(err) !== 'EEXIST') {
      return `Error creating file: ${errorMessage(err)}`
    }
  }

  try {
    return await readFile(path, 'utf-8')
  } catch (err) {
    return `Error reading file: ${errorMessage(err)}`
  }
}

/**
 * @example
 * ```typescript
 * loop.on('read-file-1', createFileContentProvider()).submit({ key: 'read-file-1', payload: 'hello.txt' })
 * ```
 */
export function createFileContentProvider(options: FileContentProviderOptions = {}): Handler {
  const placeholder = options.placeholder ?? DEFAULT_PLACEHOLDER
  return function readFileContents(path: string): Promise<string> {
    return readFileOrCreate(path, placeholder)
  }
}
