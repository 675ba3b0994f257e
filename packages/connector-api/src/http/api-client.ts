/**
 * API Client
 *
 * JSON-over-HTTP fetch collaborator with a base URL, default headers and a
 * per-request timeout.
 */

import type { DataRecord, FetchOptions, HttpFetcher, QueryParams, Value } from '@schemabridge/core';
import { ConnectorError, errorMessage, isDataRecord, toValue } from '@schemabridge/core';
import { resolvePath } from '@schemabridge/mapping';

export interface ApiClientConfig {
  /** Prefix for every endpoint (trailing slashes are ignored) */
  baseUrl?: string;
  /** Sent with every request; per-request headers win */
  headers?: Record<string, string>;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
}

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === wanted);
}

function appendQuery(url: string, query: QueryParams | undefined): string {
  if (!query) return url;
  const params = new URLSearchParams();
  for (const [name, value] of Object.entries(query)) {
    params.set(name, String(value));
  }
  const encoded = params.toString();
  if (!encoded) return url;
  return `${url}${url.includes('?') ? '&' : '?'}${encoded}`;
}

function parseBody(text: string): Value {
  if (text.length === 0) return null;
  try {
    return toValue(JSON.parse(text));
  } catch {
    return text;
  }
}

function bodyMessage(body: Value): string | undefined {
  if (isDataRecord(body) && typeof body['message'] === 'string') return body['message'];
  return undefined;
}

export class ApiClient implements HttpFetcher {
  private readonly baseUrl: string;

  constructor(private readonly config: ApiClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? '').replace(/\/+$/, '');
  }

  /**
   * Build the request URL for an endpoint
   */
  resolveUrl(endpoint: string, query?: QueryParams): string {
    const path = this.baseUrl ? `${this.baseUrl}/${endpoint.replace(/^\/+/, '')}` : endpoint;
    return appendQuery(path, query);
  }

  async fetch(endpoint: string, options: FetchOptions = {}): Promise<Value> {
    const method = options.method ?? 'GET';
    const url = this.resolveUrl(endpoint, options.query);
    const headers: Record<string, string> = { ...(this.config.headers ?? {}), ...(options.headers ?? {}) };

    let body: string | undefined;
    if (BODY_METHODS.has(method)) {
      body = JSON.stringify(options.body ?? {});
      if (!hasHeader(headers, 'Content-Type')) {
        headers['Content-Type'] = 'application/json';
      }
    }

    const timeoutMs = this.config.timeoutMs ?? 30_000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, { method, headers, body, signal: controller.signal });
      text = await response.text();
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new ConnectorError({
          code: 'TIMEOUT',
          message: `Request to ${endpoint} timed out after ${timeoutMs}ms`,
          suggestion: 'Increase timeoutMs or check network connectivity.',
        });
      }

      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `Failed to reach ${url}: ${errorMessage(err)}`,
        cause: err instanceof Error ? err : undefined,
      });
    } finally {
      clearTimeout(timeout);
    }

    const payload = parseBody(text);
    if (response.ok) {
      return payload;
    }

    const message = bodyMessage(payload) ?? `HTTP ${response.status}`;
    const context = { status: response.status, endpoint };

    if (response.status === 401 || response.status === 403) {
      throw new ConnectorError({
        code: 'AUTHENTICATION_FAILED',
        message: `Authentication failed: ${message}`,
        suggestion: 'Check the credentials in the configured request headers.',
        context,
      });
    }

    if (response.status === 404) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Endpoint not found: ${message}`,
        suggestion: 'Check the base URL and endpoint path.',
        context,
      });
    }

    if (response.status === 429) {
      throw new ConnectorError({
        code: 'RATE_LIMITED',
        message: 'API rate limit exceeded',
        suggestion: 'Wait and retry, or reduce request frequency.',
        context,
      });
    }

    throw new ConnectorError({
      code: 'READ_FAILED',
      message: `API error: ${message}`,
      context,
    });
  }
}

/**
 * Record list inside a response: the payload itself, or the value at a
 * dotted path (`data.items`). A single record becomes a one-element list;
 * non-record elements are dropped.
 */
export function recordsAt(payload: Value, path?: string): DataRecord[] {
  const target = path ? resolvePath(payload, path) : payload;
  if (Array.isArray(target)) return target.filter(isDataRecord);
  if (isDataRecord(target)) return [target];
  return [];
}
