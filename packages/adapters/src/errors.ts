import { AppErrorOptions, ProviderError } from '@patchloop/shared';

/**
 * The generation service refused the request because of rate limiting (HTTP 429).
 */
export class RateLimitError extends ProviderError {
  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    options: AppErrorOptions = {},
  ) {
    super(message, options);
  }
}

/**
 * A provider error carrying the HTTP status the service answered with.
 * 5xx statuses are transient and retried.
 */
export class ProviderHttpError extends ProviderError {
  constructor(
    message: string,
    public readonly status: number,
    options: AppErrorOptions = {},
  ) {
    super(message, { ...options, details: { status } });
  }
}
