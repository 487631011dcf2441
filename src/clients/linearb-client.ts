/**
 * LinearB REST API Client
 *
 * Uses native fetch. Only GET and POST exist: the POST endpoints this server
 * calls are query endpoints. One attempt per request, bounded by a single
 * timeout; no retries.
 */

import { SERVER_NAME, SERVER_VERSION } from '../constants.js';
import { UpstreamError } from '../errors.js';
import type { Logger } from '../logging/logger.js';

export type QueryValue = string | number | boolean;

/** Undefined values are dropped before the request is sent. */
export type QueryParams = Record<string, QueryValue | undefined>;

export interface LinearBClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  log: Logger;
  fetchFn?: typeof fetch;
}

/** Returned for 204 and for 2xx responses without a body. */
export const EMPTY_RESPONSE_RESULT = {
  status: 'success',
  message: 'Operation completed successfully',
} as const;

export class LinearBClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly fetchFn: typeof fetch;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(options: LinearBClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.log = options.log.child({ component: 'linearb-client' });
    this.fetchFn = options.fetchFn ?? fetch;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async get(path: string, query?: QueryParams): Promise<unknown> {
    return this.request('GET', path, query);
  }

  async post(path: string, body: unknown, query?: QueryParams): Promise<unknown> {
    return this.request('POST', path, query, body);
  }

  /**
   * Release the client. Safe to call more than once; only the first call
   * aborts in-flight requests. Later calls to get/post reject.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
    this.log.debug('HTTP client closed');
  }

  // ─── Internal ────────────────────────────────────────────

  private async request(
    method: 'GET' | 'POST',
    path: string,
    query?: QueryParams,
    body?: unknown
  ): Promise<unknown> {
    if (this.closed) {
      throw new UpstreamError(`HTTP client is closed; ${method} ${path} was not sent`, null, null);
    }

    const url = buildUrl(this.baseUrl, path, query);
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    this.inFlight.add(controller);

    this.log.debug({ method, path }, 'Sending request');

    try {
      const response = await this.fetchFn(url, {
        method,
        headers: {
          'x-api-key': this.apiKey,
          'Content-Type': 'application/json',
          Accept: 'application/json',
          'User-Agent': `${SERVER_NAME}/${SERVER_VERSION}`,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      const text = await response.text();

      if (!response.ok) {
        this.log.error({ method, path, status: response.status }, 'API request failed');
        throw new UpstreamError(
          `API request failed with status ${response.status}: ${text}`,
          response.status,
          text
        );
      }

      return parseBody(response.status, text);
    } catch (error) {
      if (error instanceof UpstreamError) throw error;

      let reason: string;
      if (this.closed) {
        reason = 'request aborted because the client was closed';
      } else if (timedOut) {
        reason = `request timed out after ${this.timeoutMs}ms`;
      } else {
        reason = error instanceof Error ? error.message : String(error);
      }
      this.log.error({ method, path, reason }, 'Request error');
      throw new UpstreamError(`Network error: ${reason}`, null, null);
    } finally {
      clearTimeout(timeout);
      this.inFlight.delete(controller);
    }
  }
}

export function buildUrl(baseUrl: string, path: string, query?: QueryParams): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) params.set(key, String(value));
  }
  const search = params.toString();
  return search ? `${baseUrl}${path}?${search}` : `${baseUrl}${path}`;
}

function parseBody(status: number, text: string): unknown {
  if (status === 204 || text.trim() === '') {
    return { ...EMPTY_RESPONSE_RESULT };
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new UpstreamError(`Unexpected error: response is not valid JSON (status ${status})`, status, text);
  }
}
