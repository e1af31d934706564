import { logEvent } from '../logger.js';
import { toError } from '../errors/band-error.js';
import { buildBasicAuthHeader } from './basic-auth.js';
import { TransportError } from './transport-error.js';
import type { BasicAuthCredentials, HttpResponse, IHttpTransport, QueryParams } from './types.js';

export interface FetchHttpTransportOptions {
  /** Aborts a request that has not completed in time; unset never aborts */
  timeoutMs?: number;
  /** Replacement for the global fetch, mainly for tests */
  fetch?: typeof globalThis.fetch;
}

/**
 * Appends query parameters to a URL, keeping any query it already carries.
 * @throws {TransportError} When the URL cannot be parsed
 * @public
 */
export function buildRequestUrl(url: string, query: QueryParams = {}): URL {
  let target: URL;
  try {
    target = new URL(url);
  } catch (error) {
    throw TransportError.invalidUrl(url, toError(error));
  }

  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      target.searchParams.append(key, String(value));
    }
  }
  return target;
}

/**
 * {@link IHttpTransport} backed by the global fetch.
 *
 * No retries are attempted; a failed request surfaces immediately as a
 * {@link TransportError}.
 * @public
 */
export class FetchHttpTransport implements IHttpTransport {
  private readonly timeoutMs?: number;
  private readonly fetchImpl: typeof globalThis.fetch;

  public constructor(options: FetchHttpTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  public get(
    url: string,
    query?: QueryParams,
    basicAuth?: BasicAuthCredentials,
  ): Promise<HttpResponse> {
    return this.send('GET', url, query, basicAuth);
  }

  public post(url: string, query?: QueryParams): Promise<HttpResponse> {
    return this.send('POST', url, query);
  }

  private async send(
    method: 'GET' | 'POST',
    url: string,
    query?: QueryParams,
    basicAuth?: BasicAuthCredentials,
  ): Promise<HttpResponse> {
    const target = buildRequestUrl(url, query);
    // Never log the query: it carries access_token and code
    const endpoint = `${target.origin}${target.pathname}`;

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (basicAuth) {
      headers.Authorization = buildBasicAuthHeader(basicAuth);
    }

    logEvent('debug', 'http:request', { method, endpoint });

    try {
      const response = await this.fetchImpl(target, {
        method,
        headers,
        signal: this.timeoutMs !== undefined ? AbortSignal.timeout(this.timeoutMs) : undefined,
      });

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key.toLowerCase()] = value;
      });
      const body = await response.text();

      logEvent('debug', 'http:response', { method, endpoint, status: response.status });

      return { status: response.status, headers: responseHeaders, body };
    } catch (error) {
      const cause = toError(error);
      logEvent('warn', 'http:request_failed', { method, endpoint, error: cause.message });

      if (cause.name === 'TimeoutError' && this.timeoutMs !== undefined) {
        throw TransportError.requestTimeout(endpoint, this.timeoutMs, cause);
      }
      throw TransportError.connectionFailed(endpoint, cause);
    }
  }
}
