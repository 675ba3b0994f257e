export type { SqlDialect, StatementExecutor, StorageEngine } from './storage-engine.js';
export type { HttpMethod, QueryParams, FetchOptions, HttpFetcher } from './http-fetcher.js';
export type { ContentStore } from './content-store.js';
