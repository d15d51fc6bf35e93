export {
  createFileContentProvider,
  readFileOrCreate,
  DEFAULT_PLACEHOLDER,
  type FileContentProviderOptions,
} from './file-provider.js'
export {
  createRemoteRecordFetcher,
  fetchRemoteRecord,
  formatRemotePost,
  RemotePostSchema,
  DEFAULT_API_BASE_URL,
  FETCH_ERROR,
  DECODE_ERROR,
  type RemotePost,
  type FetchLike,
  type RemoteRecordFetcherOptions,
} from './remote-fetcher.js'
