import axios, { AxiosInstance, AxiosResponse } from 'axios';
import pino, { Logger } from 'pino';
import { ConfigurationError, RetriesExhaustedError } from './errors';
import { cookieHeader, headerValue, mergeSetCookie, parseRetryAfter } from './headers';
import { PageIterator } from './pageIterator';
import { DEFAULT_BASE_URL } from './resources';
import type {
  HttpMethod,
  ProxyCredentialsProvider,
  RequestOptions,
  RequestOutcome,
  SessionConfig,
} from './types';

const DEFAULT_MAX_RETRIES = 6;
const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_MAX_PAGES = 1000;

const ABSOLUTE_URL_RE = /^[a-z][a-z\d+.-]*:\/\//i;

function hostOf(url: string): string {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    throw new ConfigurationError(`Invalid URL: ${url}`);
  }
}

// Largest delay setTimeout honours; longer ones fire after 1 ms.
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export type Timer = (resolve: () => void, ms: number) => void;

const setTimer: Timer = (resolve, ms) => {
  setTimeout(resolve, ms);
};

/** Resolves after `ms`, waiting in steps no longer than a timer can hold. */
export async function wait(ms: number, timer: Timer = setTimer): Promise<void> {
  let remaining = ms;
  while (remaining > 0) {
    const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
    await new Promise<void>(resolve => timer(resolve, step));
    remaining -= step;
  }
}

/**
 * HTTP session with retry on 429/407 and `Link` header pagination.
 *
 * A session carries mutable state between calls (cookie jars, proxy
 * credentials). It has a single owner: do not drive two of its
 * sequences concurrently.
 *
 * Cookies are kept per host, and the bearer token is only sent to the host
 * of `baseUrl`, so a next link naming another host gets neither.
 */
export class Session {
  readonly baseUrl: string;
  readonly maxRetries: number;
  readonly maxPages: number;
  readonly logger: Logger;

  private readonly http: AxiosInstance;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly proxyCredentials?: ProxyCredentialsProvider;
  private readonly headers: Record<string, string>;
  private readonly baseHost: string;
  private readonly cookies = new Map<string, Map<string, string>>();

  constructor(config: SessionConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.maxPages = config.maxPages ?? DEFAULT_MAX_PAGES;
    this.logger = config.logger ?? pino({ level: 'silent' });
    this.sleep = config.sleep ?? (ms => wait(ms));
    this.proxyCredentials = config.proxyCredentials;
    this.headers = { ...config.headers };
    this.baseHost = hostOf(this.baseUrl);
    this.cookies.set(this.baseHost, new Map(Object.entries(config.cookies ?? {})));

    if (config.token) {
      this.headers.Authorization = `Bearer ${config.token}`;
    }

    this.http = axios.create({
      ...config.transport,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      validateStatus: status => status >= 200 && status < 300,
    });
  }

  /** Lazily fetches `url` and every page its `Link: rel="next"` headers point to. */
  request<T = unknown>(method: HttpMethod, url: string, options: RequestOptions = {}): PageIterator<T> {
    return new PageIterator<T>(this, method, url, options);
  }

  get<T = unknown>(url: string, options?: RequestOptions): PageIterator<T> {
    return this.request<T>('GET', url, options);
  }

  post<T = unknown>(url: string, options?: RequestOptions): PageIterator<T> {
    return this.request<T>('POST', url, options);
  }

  put<T = unknown>(url: string, options?: RequestOptions): PageIterator<T> {
    return this.request<T>('PUT', url, options);
  }

  patch<T = unknown>(url: string, options?: RequestOptions): PageIterator<T> {
    return this.request<T>('PATCH', url, options);
  }

  delete<T = unknown>(url: string, options?: RequestOptions): PageIterator<T> {
    return this.request<T>('DELETE', url, options);
  }

  normalizeUrl(url: string): string {
    if (ABSOLUTE_URL_RE.test(url)) return url;
    return `${this.baseUrl}/${url.replace(/^\/+/, '')}`;
  }

  /**
   * Fetches one page, retrying rate-limited and proxy-auth responses until
   * the retry budget is spent. Everything else is rethrown as-is.
   */
  async execute<T>(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<AxiosResponse<T>> {
    const target = this.normalizeUrl(url);
    let retries = 0;

    for (;;) {
      const outcome = await this.attempt<T>(method, target, options);

      switch (outcome.kind) {
        case 'ok':
          return outcome.response;

        case 'fatal':
          throw outcome.error;

        case 'rateLimited': {
          retries++;
          if (retries > this.maxRetries) {
            throw new RetriesExhaustedError(target, retries, 429, outcome.retryAfter);
          }
          this.logger.warn(
            { url: target, retryAfter: outcome.retryAfter, attempt: retries, maxRetries: this.maxRetries },
            'Rate limited (429), waiting before retry',
          );
          await this.sleep(outcome.retryAfter * 1000);
          break;
        }

        case 'proxyAuthRequired': {
          if (!this.proxyCredentials) throw outcome.error;
          retries++;
          if (retries > this.maxRetries) {
            throw new RetriesExhaustedError(target, retries, 407);
          }
          this.logger.warn({ url: target, attempt: retries }, 'Proxy authentication required (407)');
          const { username, password } = await this.proxyCredentials();
          const encoded = Buffer.from(`${username}:${password}`).toString('base64');
          this.headers['Proxy-Authorization'] = `Basic ${encoded}`;
          break;
        }
      }
    }
  }

  private jarFor(host: string): Map<string, string> {
    let jar = this.cookies.get(host);
    if (!jar) {
      jar = new Map();
      this.cookies.set(host, jar);
    }
    return jar;
  }

  private async attempt<T>(method: HttpMethod, url: string, options: RequestOptions): Promise<RequestOutcome<T>> {
    const host = hostOf(url);
    const jar = this.jarFor(host);
    const headers: Record<string, string> = { ...this.headers };
    if (host !== this.baseHost) delete headers.Authorization;
    Object.assign(headers, options.headers);
    const cookie = cookieHeader(jar);
    if (cookie) headers.Cookie = cookie;

    try {
      const response = await this.http.request<T>({
        method,
        url,
        params: options.params,
        data: options.data,
        headers,
      });
      mergeSetCookie(jar, headerValue(response.headers, 'set-cookie'));
      this.logger.debug({ method, url, status: response.status }, 'Request completed');
      this.logger.trace({ request: headers, response: response.headers }, 'Request headers');
      return { kind: 'ok', response };
    } catch (err) {
      if (!axios.isAxiosError(err) || !err.response) {
        this.logger.debug({ method, url, err }, 'Transport error');
        return { kind: 'fatal', error: err };
      }

      const { response } = err;
      mergeSetCookie(jar, headerValue(response.headers, 'set-cookie'));
      this.logger.debug({ method, url, status: response.status }, 'Request failed');

      if (response.status === 429) {
        return { kind: 'rateLimited', url, retryAfter: parseRetryAfter(headerValue(response.headers, 'retry-after')) };
      }
      if (response.status === 407) {
        return { kind: 'proxyAuthRequired', url, error: err };
      }
      return { kind: 'fatal', error: err };
    }
  }
}

export function createSession(config: SessionConfig = {}): Session {
  return new Session(config);
}
