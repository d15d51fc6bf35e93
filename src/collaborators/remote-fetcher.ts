/**
 * Remote-record fetcher handler: looks up a post by id over HTTP and
 * formats it as a string. Network and decoding failures are returned as
 * error-description strings.
 */

import { z } from 'zod'

import type { Handler, HandlerContext } from '../schemas.js'

export const DEFAULT_API_BASE_URL = 'https://jsonplaceholder.typicode.com'

export const FETCH_ERROR = 'Error fetching data from API'
export const DECODE_ERROR = 'Error decoding data from API'

export const RemotePostSchema = z.object({
  id: z.number().int(),
  userId: z.number().int(),
  title: z.string(),
  body: z.string(),
})

export type RemotePost = z.infer<typeof RemotePostSchema>

/** The subset of fetch the fetcher relies on */
export type FetchLike = (
  url: string,
  init?: { signal?: AbortSignal }
) => Promise<Pick<Response, 'ok' | 'status' | 'json'>>

export interface RemoteRecordFetcherOptions {
  /** API root, `/posts/<id>` is appended (default: jsonplaceholder) */
  baseUrl?: string
  /** Defaults to the global fetch */
  fetch?: FetchLike
}

export function formatRemotePost(post: RemotePost): string {
  return (
    `Fetched post from API: {id: ${post.id}, userId: ${post.userId}, ` +
    `title: ${JSON.stringify(post.title)}, body: ${JSON.stringify(post.body)}}`
  )
}

export async function fetchRemoteRecord(
  id: string,
  options: RemoteRecordFetcherOptions & { signal?: AbortSignal } = {}
): Promise<string> {
  const baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '')
  const fetchImpl: FetchLike = options.fetch ?? fetch
  const url = `${baseUrl}/posts/${encodeURIComponent(id)}`

  let response: Pick<Response, 'ok' | 'status' | 'json'>
  try {
    response = await fetchImpl(url, { signal: options.signal })
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    return `${FETCH_ERROR}: ${reason}`
  }
  if (!response.ok) {
    return `${FETCH_ERROR}: HTTP ${response.status}`
  }

  let body: unknown
  try {
    body = await response.json()
  } catch {
    return DECODE_ERROR
  }

  const parsed = RemotePostSchema.safeParse(body)
  if (!parsed.success) {
    return DECODE_ERROR
  }
  return formatRemotePost(parsed.data)
}

/**
 * @example
 * ```typescript
 * loop.on('fetch-from-api-2', createRemoteRecordFetcher()).submit({ key: 'fetch-from-api-2', payload: '2', mode: 'async' })
 * ```
 */
export function createRemoteRecordFetcher(options: RemoteRecordFetcherOptions = {}): Handler {
  return function fetchRecord(id: string, context: HandlerContext): Promise<string> {
    return fetchRemoteRecord(id, { ...options, signal: context.signal })
  }
}
