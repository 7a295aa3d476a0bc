/**
 * Error codes used throughout patchloop.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ProviderError'
  | 'ConflictError'
  | 'ValidationError'
  | 'ExecutionError'
  | 'TimeoutError'
  | 'BudgetExhausted'
  | 'NoProgress'
  | 'Cancelled'
  | 'SnapshotCorrupted'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all patchloop errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ProviderError', 'API request failed', {
 *   cause: originalError,
 *   details: { statusCode: 500, provider: 'openai' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when the generation service fails.
 */
export class ProviderError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ProviderError', message, options);
  }
}

/**
 * A patch could not be applied cleanly to its base snapshot.
 * Recoverable: the conflict list is fed back to the generator.
 */
export class ConflictError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConflictError', message, options);
  }
}

/**
 * A patch was malformed, empty, oversized or touched a forbidden path.
 * Recoverable in the same way as a conflict.
 */
export class PatchValidationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ValidationError', message, options);
  }
}

/**
 * The test command could not be started at all.
 */
export class ExecutionError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ExecutionError', message, options);
  }
}

/**
 * Error thrown when a test run or a generation call exceeds its bound.
 * Carries whatever output was captured before the process was stopped.
 */
export class TimeoutError extends AppError {
  public readonly partialOutput: string;

  constructor(message: string, options: AppErrorOptions & { partialOutput?: string } = {}) {
    super('TimeoutError', message, options);
    this.partialOutput = options.partialOutput ?? '';
  }
}

/**
 * The iteration (or wall-clock) budget ran out before the tests passed.
 */
export class BudgetExhaustedError extends AppError {
  /** The specific budget that was exhausted */
  public readonly reason: string;

  constructor(reason: string, options: AppErrorOptions = {}) {
    super('BudgetExhausted', `Budget exhausted: ${reason}`, options);
    this.reason = reason;
  }
}

/**
 * The generator declared the work done while the tests still did not pass.
 */
export class NoProgressError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('NoProgress', message, options);
  }
}

/**
 * The session was cancelled from outside.
 */
export class CancelledError extends AppError {
  constructor(message = 'Session cancelled', options: AppErrorOptions = {}) {
    super('Cancelled', message, options);
  }
}

/**
 * The snapshot store no longer holds the content a snapshot refers to.
 */
export class SnapshotCorruptedError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('SnapshotCorrupted', message, options);
  }
}

/**
 * Errors that end a session rather than feeding back into the loop.
 */
export function isTerminalError(error: unknown): boolean {
  return (
    error instanceof BudgetExhaustedError ||
    error instanceof CancelledError ||
    error instanceof SnapshotCorruptedError
  );
}

/**
 * Process exit code for an error surfaced by the CLI.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}
