/**
 * HTTP Fetch Interface
 *
 * Retrieves and decodes remote JSON payloads.
 */

import type { Value } from '../types/index.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryParams = { [name: string]: string | number | boolean };

export interface FetchOptions {
  method?: HttpMethod;
  /** Appended to the URL as a query string */
  query?: QueryParams;
  /** JSON request body (POST, PUT, PATCH) */
  body?: Value;
  /** Merged over the fetcher's default headers */
  headers?: Record<string, string>;
}

export interface HttpFetcher {
  /**
   * Request an endpoint and decode its JSON response
   * (non-JSON bodies are returned as text)
   * @throws ConnectorError on network failure, timeout or non-2xx status
   */
  fetch(endpoint: string, options?: FetchOptions): Promise<Value>;
}
