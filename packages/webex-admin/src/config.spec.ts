import { ConfigurationError } from './api/errors';
import { loadConfig } from './config';
import { levelForVerbosity } from './logger';

describe('loadConfig', () => {
  it('falls back to the public Webex endpoints', () => {
    expect(loadConfig({})).toEqual({
      token: undefined,
      baseUrl: 'https://webexapis.com/v1',
      identityUrl: 'https://webexapis.com/identity',
      maxRetries: 6,
      timeoutMs: 10_000,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      WEBEX_TEAMS_ACCESS_TOKEN: 'test-token',
      WEBEX_BASE_URL: 'https://api.example.test/v1',
      WEBEX_IDENTITY_URL: 'https://identity.example.test',
      WEBEX_MAX_RETRIES: '2',
      WEBEX_TIMEOUT_MS: '500',
    });

    expect(config).toEqual({
      token: 'test-token',
      baseUrl: 'https://api.example.test/v1',
      identityUrl: 'https://identity.example.test',
      maxRetries: 2,
      timeoutMs: 500,
    });
  });

  it('rejects numbers it cannot read', () => {
    expect(() => loadConfig({ WEBEX_MAX_RETRIES: 'many' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ WEBEX_TIMEOUT_MS: '-1' })).toThrow(ConfigurationError);
  });
});

describe('levelForVerbosity', () => {
  it('maps -v counts to pino levels', () => {
    expect(levelForVerbosity(0)).toBe('info');
    expect(levelForVerbosity(1)).toBe('debug');
    expect(levelForVerbosity(3)).toBe('trace');
  });
});
