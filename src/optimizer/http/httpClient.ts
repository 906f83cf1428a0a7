/**
 * HTTP Client
 *
 * Thin wrapper over fetch used by the scrapers, the GitHub API calls and the
 * job page download. Adds the user agent, a per-request timeout and a typed
 * error for non-2xx responses. The fetch implementation is injectable so
 * tests never leave the process.
 */

import { createComponentLogger } from '../../shared/logging/logger';

const log = createComponentLogger('http');

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  timeoutMs: number;
  userAgent: string;
  fetch?: FetchLike;
}

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly body: string
  ) {
    super(`HTTP ${status} for ${url}${body ? `: ${body.slice(0, 200)}` : ''}`);
    this.name = 'HttpError';
  }
}

const DEFAULT_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';

export class HttpClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Issue a request; resolves with the response whatever its status
   */
  async request(url: string, init: RequestInit = {}): Promise<Response> {
    const headers = new Headers(init.headers);
    if (!headers.has('User-Agent')) {
      headers.set('User-Agent', this.options.userAgent);
    }
    if (!headers.has('Accept')) {
      headers.set('Accept', DEFAULT_ACCEPT);
    }
    if (!headers.has('Accept-Language')) {
      headers.set('Accept-Language', 'en-US,en;q=0.5');
    }

    const started = Date.now();
    const response = await this.fetchImpl(url, {
      ...init,
      headers,
      redirect: 'follow',
      signal: init.signal ?? AbortSignal.timeout(this.options.timeoutMs)
    });
    log.debug(
      { method: init.method ?? 'GET', url, status: response.status, elapsedMs: Date.now() - started },
      'http request'
    );
    return response;
  }

  /**
   * GET a URL and return its body, throwing HttpError on non-2xx
   */
  async getText(url: string, headers: Record<string, string> = {}): Promise<string> {
    const response = await this.request(url, { headers });
    const body = await response.text();
    if (!response.ok) {
      throw new HttpError(response.status, url, body);
    }
    return body;
  }

  async getJson(url: string, headers: Record<string, string> = {}): Promise<unknown> {
    const text = await this.getText(url, { Accept: 'application/json', ...headers });
    return JSON.parse(text);
  }
}
