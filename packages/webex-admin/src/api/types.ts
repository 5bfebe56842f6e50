import type { AxiosError, AxiosRequestConfig, AxiosResponse } from 'axios';
import type { Logger } from 'pino';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
  params?: QueryParams;
  data?: unknown;
  headers?: Record<string, string>;
}

export interface ProxyCredentials {
  username: string;
  password: string;
}

export type ProxyCredentialsProvider = () => Promise<ProxyCredentials>;

/**
 * Options handed to axios untouched. The session owns url, method, headers,
 * timeout and status validation.
 */
export type TransportOptions = Omit<
  AxiosRequestConfig,
  'url' | 'method' | 'baseURL' | 'headers' | 'params' | 'data' | 'timeout' | 'validateStatus'
>;

export interface SessionConfig {
  baseUrl?: string;
  token?: string;
  maxRetries?: number;
  timeoutMs?: number;
  headers?: Record<string, string>;
  cookies?: Record<string, string>;
  /** Upper bound on pages fetched by a single request() sequence. */
  maxPages?: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  proxyCredentials?: ProxyCredentialsProvider;
  transport?: TransportOptions;
}

// One attempt at one page. The retry loop switches on `kind`.
export type RequestOutcome<T = unknown> =
  | { kind: 'ok'; response: AxiosResponse<T> }
  | { kind: 'rateLimited'; url: string; retryAfter: number }
  | { kind: 'proxyAuthRequired'; url: string; error: AxiosError }
  | { kind: 'fatal'; error: unknown };

export interface LinkCursor {
  nextUrl: string | null;
  pagesFetched: number;
  visited: Set<string>;
}
