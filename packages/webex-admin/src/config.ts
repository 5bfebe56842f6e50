import { ConfigurationError } from './api/errors';
import { DEFAULT_BASE_URL, DEFAULT_IDENTITY_URL } from './api/resources';
import { TOKEN_ENV } from './auth/token';

export interface AppConfig {
  token?: string;
  baseUrl: string;
  identityUrl: string;
  maxRetries: number;
  timeoutMs: number;
}

function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return Number(raw);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    token: env[TOKEN_ENV]?.trim() || undefined,
    baseUrl: env.WEBEX_BASE_URL?.trim() || DEFAULT_BASE_URL,
    identityUrl: env.WEBEX_IDENTITY_URL?.trim() || DEFAULT_IDENTITY_URL,
    maxRetries: positiveInt(env, 'WEBEX_MAX_RETRIES', 6),
    timeoutMs: positiveInt(env, 'WEBEX_TIMEOUT_MS', 10_000),
  };
}
