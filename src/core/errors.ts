/**
 * Custom error types for DART API interactions and persistence.
 * Enables callers to handle different failure modes appropriately.
 */

export class DartApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string,
    public readonly dartStatus?: string
  ) {
    super(message);
    this.name = 'DartApiError';
  }
}

/** DART answered HTTP 200 with a non-000 status code (e.g. 013: no data) */
export class DartStatusError extends DartApiError {
  constructor(url: string, dartStatus: string, dartMessage: string) {
    super(`DART status ${dartStatus}: ${dartMessage || 'unknown error'}`, 200, url, dartStatus);
    this.name = 'DartStatusError';
  }
}

export class RateLimitError extends DartApiError {
  constructor(url: string) {
    super(
      'DART API rate limit exceeded. Lower DART_REQUESTS_PER_SECOND or wait before retrying.',
      429,
      url
    );
    this.name = 'RateLimitError';
  }
}

export class DataParseError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'DataParseError';
  }
}

export class PersistenceError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PersistenceError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
