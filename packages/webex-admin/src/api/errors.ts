export class WebexAdminError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WebexAdminError';
  }
}

export type RetryableStatus = 407 | 429;

export class RetriesExhaustedError extends WebexAdminError {
  constructor(
    readonly url: string,
    readonly attempts: number,
    readonly status: RetryableStatus,
    readonly retryAfter: number | null = null,
  ) {
    super(`Gave up on ${url} after ${attempts} attempts (last status ${status})`);
    this.name = 'RetriesExhaustedError';
  }
}

export class ConfigurationError extends WebexAdminError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends WebexAdminError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}
