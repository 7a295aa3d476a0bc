import { CancelledError, ConfigError, TimeoutError } from '@patchloop/shared';
import type { AdapterContext, RetryOptions } from '../types';
import { ProviderHttpError, RateLimitError } from '../errors';

/**
 * Default retry options for generation requests.
 *
 * ## Retriable errors
 * - `RateLimitError` (HTTP 429), honouring its retry-after hint
 * - `TimeoutError` of a single attempt
 * - `ProviderHttpError` with a 5xx status
 * - Network errors (ETIMEDOUT, ECONNRESET, ECONNREFUSED)
 *
 * `ConfigError` and cancellation fail immediately.
 *
 * ## Delay calculation
 *
 * ```
 * delay = min(maxDelayMs, initialDelayMs * (backoffFactor ^ (attempt - 1)))
 * finalDelay = max(0, delay +/- 10% jitter)
 * ```
 */
export const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
};

const NETWORK_ERROR_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED']);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return errorCode(error.cause);
  return undefined;
}

/**
 * Determines if an error is safe to retry.
 */
export function isRetriableError(error: unknown): boolean {
  if (error instanceof RateLimitError || error instanceof TimeoutError) {
    return true;
  }
  if (error instanceof ProviderHttpError) {
    return error.status >= 500 && error.status < 600;
  }
  const code = errorCode(error);
  return code !== undefined && NETWORK_ERROR_CODES.has(code);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Executes a generation request with retry, a per-attempt timeout and abort handling.
 *
 * ```typescript
 * const completion = await executeProviderRequest(
 *   ctx,
 *   'openai',
 *   'gpt-5-codex',
 *   (signal) => client.chat.completions.create({ ... }, { signal }),
 *   { maxRetries: 5 },
 * );
 * ```
 */
export async function executeProviderRequest<T>(
  ctx: AdapterContext,
  provider: string,
  model: string,
  requestFn: (signal: AbortSignal) => Promise<T>,
  optionsOverride: RetryOptions = {},
): Promise<T> {
  const { maxRetries, initialDelayMs, maxDelayMs, backoffFactor } = {
    ...DEFAULT_RETRY_OPTIONS,
    ...ctx.retryOptions,
    ...optionsOverride,
  };
  const log = ctx.logger.child({ provider, model });
  const startTime = Date.now();
  await log.debug('Generation request started');

  let attempts = 0;
  let lastError: unknown;

  while (attempts <= maxRetries) {
    if (ctx.abortSignal?.aborted) {
      throw new CancelledError('Generation cancelled');
    }

    const abortController = new AbortController();
    const abortHandler = () => abortController.abort();
    ctx.abortSignal?.addEventListener('abort', abortHandler);

    let timedOut = false;
    let timeoutId: NodeJS.Timeout | undefined;
    if (ctx.timeoutMs) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        abortController.abort();
      }, ctx.timeoutMs);
    }

    try {
      const result = await requestFn(abortController.signal);
      await log.debug(
        `Generation request finished in ${Date.now() - startTime}ms after ${attempts} retries`,
      );
      return result;
    } catch (error: unknown) {
      lastError = timedOut
        ? new TimeoutError(`Generation request timed out after ${ctx.timeoutMs}ms`, {
            cause: error,
          })
        : error;

      if (ctx.abortSignal?.aborted) {
        throw new CancelledError('Generation cancelled', { cause: error });
      }
      if (lastError instanceof ConfigError || !isRetriableError(lastError) || attempts >= maxRetries) {
        break;
      }

      attempts++;
      const hinted = lastError instanceof RateLimitError ? lastError.retryAfterMs : undefined;
      const delay = Math.min(maxDelayMs, initialDelayMs * Math.pow(backoffFactor, attempts - 1));
      const jitter = delay * 0.1 * (Math.random() * 2 - 1);
      const finalDelay = Math.max(0, hinted ?? delay + jitter);
      await log.warn(
        `Retrying generation request in ${Math.round(finalDelay)}ms (attempt ${attempts}/${maxRetries}): ${
          lastError instanceof Error ? lastError.message : String(lastError)
        }`,
      );
      await sleep(finalDelay, ctx.abortSignal);
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
      ctx.abortSignal?.removeEventListener('abort', abortHandler);
    }
  }

  await log.debug(
    `Generation request failed after ${attempts} retries in ${Date.now() - startTime}ms`,
  );
  throw lastError;
}
