// utils/httpClient.ts
/**
 * Generic HTTP Client
 *
 * One instance is created per invocation and handed to every provider
 * adapter. It sends GET requests, buffers the body as text and hands the
 * status back to the caller: deciding what a non-2xx means is the adapter's
 * job, since each provider shapes its error bodies differently.
 */

import { log, ERR, LOG } from './log.js';
import { TransportError, errorMessage } from './errors.js';

/** Per-request timeout when none is configured */
export const DEFAULT_TIMEOUT_MS = 30_000;

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  /** Underlying fetch; defaults to the global one */
  fetchImpl?: FetchFn;
  /** Abort a request after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Options for HTTP requests
 */
export interface HttpRequestOptions {
  /** Custom headers to include in the request */
  headers?: Record<string, string>;
  /** Context for logging (e.g., 'Polygon API', 'CoinGecko API') */
  context?: string;
}

/** A fully-read response */
export interface HttpTextResponse {
  status: number;
  statusText: string;
  /** True for 2xx */
  ok: boolean;
  body: string;
}

export class HttpClient {
  private readonly fetchImpl: FetchFn;
  private readonly timeoutMs: number;

  constructor(options: HttpClientOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * GETs a URL and returns status plus body text.
   *
   * @throws TransportError if no response arrives (network failure, timeout)
   */
  async getText(url: string, options: HttpRequestOptions = {}): Promise<HttpTextResponse> {
    const context = options.context || 'HTTP';

    const headers: Record<string, string> = {
      'Accept': 'application/json',
      ...options.headers,
    };

    log(`[${context}] GET ${maskSensitiveUrl(url)}`, LOG);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = isTimeout(error)
        ? `request timed out after ${this.timeoutMs}ms`
        : describeFetchError(error);
      log(`[${context}] Network/Request Error: ${reason}`, ERR);
      throw new TransportError(reason);
    }

    log(`[${context}] Response: ${response.status} ${response.statusText}`, LOG);

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      const reason = isTimeout(error)
        ? `request timed out after ${this.timeoutMs}ms`
        : `failed to read response body: ${errorMessage(error)}`;
      log(`[${context}] ${reason}`, ERR);
      throw new TransportError(reason);
    }

    if (!response.ok) {
      log(`[${context}] ❌ Error Response: ${body.substring(0, 200)}`, ERR);
    }

    return {
      status: response.status,
      statusText: response.statusText,
      ok: response.ok,
      body,
    };
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * undici reports "fetch failed" and keeps the useful part in `cause`
 */
function describeFetchError(error: unknown): string {
  const message = errorMessage(error);
  if (error instanceof Error && error.cause instanceof Error) {
    return `${message}: ${error.cause.message}`;
  }
  return message;
}

/**
 * Masks sensitive information in URLs (API keys, tokens, etc.)
 */
export function maskSensitiveUrl(url: string): string {
  // Mask common API key parameter names
  const sensitiveParams = [
    'x_cg_key',
    'x_cg_demo_api_key',
    'api_key',
    'apikey',
    'token',
    'access_token',
  ];

  let maskedUrl = url;
  for (const param of sensitiveParams) {
    const regex = new RegExp(`([?&])(${param})=[^&]+`, 'gi');
    maskedUrl = maskedUrl.replace(regex, '$1$2=***MASKED***');
  }

  return maskedUrl;
}
