/**
 * HTTP transport for the Logs API.
 *
 * Issues a single GET and hands back the status and body untouched; deciding
 * what a status means is left to the polling executor.
 */

import { NetworkError } from '../errors/index.js';

export type QueryParams = Record<string, string>;

/**
 * A fully assembled export request.
 */
export interface ExportHttpRequest {
  /** Absolute URL without query string */
  url: string;
  /** Query parameters, appended in insertion order */
  query: QueryParams;
  /** Request headers */
  headers: Record<string, string>;
}

/**
 * Raw export response.
 */
export interface ExportHttpResponse {
  status: number;
  headers: Headers;
  body: string;
}

/**
 * Configuration for HTTP transport.
 */
export interface HttpTransportConfig {
  /** Request timeout in milliseconds */
  timeoutMs: number;
  /** Optional custom fetch implementation */
  fetch?: typeof fetch;
}

/**
 * HTTP transport implementation using the Fetch API.
 */
export class HttpTransport {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: HttpTransportConfig) {
    this.timeoutMs = config.timeoutMs;
    this.fetchImpl = config.fetch ?? globalThis.fetch;
  }

  /**
   * Sends the request once.
   * @throws NetworkError when no HTTP response is received
   */
  async get(request: ExportHttpRequest): Promise<ExportHttpResponse> {
    const url = buildUrl(request.url, request.query);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: request.headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw toNetworkError(error, this.timeoutMs);
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw toNetworkError(error, this.timeoutMs);
    }

    return {
      status: response.status,
      headers: response.headers,
      body,
    };
  }
}

/**
 * Appends query parameters to a URL.
 */
export function buildUrl(base: string, query: QueryParams): string {
  const params = new URLSearchParams(query);
  const rendered = params.toString();
  return rendered ? `${base}?${rendered}` : base;
}

function toNetworkError(error: unknown, timeoutMs: number): NetworkError {
  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new NetworkError(`Request timeout after ${timeoutMs}ms`, error);
    }
    return new NetworkError(error.message, error);
  }
  return new NetworkError(String(error));
}
