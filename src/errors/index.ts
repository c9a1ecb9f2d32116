/**
 * Custom Error Classes
 *
 * Standardized error types for better error handling and debugging.
 */

/**
 * Base error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error for validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, public field: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

/**
 * Error for external API failures
 */
export class ApiError extends AppError {
  constructor(
    message: string,
    public url: string,
    public statusCode: number,
    cause?: Error,
    code: string = 'API_ERROR'
  ) {
    super(message, code, statusCode, cause);
  }
}

/**
 * Network error, timeout, 408 or 5xx: worth another attempt
 */
export class TransientUpstreamError extends ApiError {
  constructor(message: string, url: string, statusCode: number, cause?: Error) {
    super(message, url, statusCode, cause, 'UPSTREAM_TRANSIENT');
  }
}

/**
 * 429 from upstream. `retryAfterMs` comes from the Retry-After header when sent.
 */
export class RateLimitedError extends TransientUpstreamError {
  constructor(message: string, url: string, public retryAfterMs?: number) {
    super(message, url, 429);
    this.code = 'UPSTREAM_RATE_LIMITED';
  }
}

/**
 * Malformed response or rejected request: retrying cannot help
 */
export class NonTransientUpstreamError extends ApiError {
  constructor(message: string, url: string, statusCode: number, cause?: Error) {
    super(message, url, statusCode, cause, 'UPSTREAM_REJECTED');
  }
}

/**
 * Retries exhausted and no usable cached copy for the key
 */
export class UpstreamUnavailableError extends AppError {
  constructor(message: string, public key: string, public attempts: number, cause?: Error) {
    super(message, 'UPSTREAM_UNAVAILABLE', 503, cause);
  }
}

/**
 * Error for persistent cache tier operations (file or Redis)
 */
export class CacheIOError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'CACHE_IO_ERROR', 500, cause);
  }
}

/**
 * The caller abandoned the operation through its AbortSignal
 */
export class CancelledError extends AppError {
  constructor(public operation: string) {
    super(`${operation} cancelled`, 'CANCELLED', 499);
  }
}

/**
 * Normalizes anything thrown into an Error instance
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * True for failures the fetcher should retry
 */
export function isTransient(err: unknown): err is TransientUpstreamError {
  return err instanceof TransientUpstreamError;
}

/**
 * Throws CancelledError when the signal has already fired
 */
export function throwIfCancelled(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) throw new CancelledError(operation);
}

/**
 * Short message for the status line, built from the error and the root
 * cause that made the dataset unavailable.
 *
 * @example
 * userFacingMessage(new Error('connect ECONNREFUSED'), 'Games')
 * // Returns: 'No connection. Check your network.'
 */
export function userFacingMessage(err: unknown, prefix: string): string {
  const root = err instanceof AppError && err.cause ? err.cause : err;
  const error = toError(root);
  const msg = error.message.trim() || error.name;
  const lower = msg.toLowerCase();

  if (root instanceof RateLimitedError || lower.includes('429') || lower.includes('too many')) {
    return 'Too many requests. Wait a moment and retry.';
  }
  if (lower.includes('timeout') || lower.includes('timed out')) {
    return 'Connection timeout. Try again later.';
  }
  if (
    lower.includes('connection') ||
    lower.includes('network') ||
    lower.includes('unreachable') ||
    lower.includes('econnrefused') ||
    lower.includes('enotfound')
  ) {
    return 'No connection. Check your network.';
  }
  if ((root instanceof ApiError && root.statusCode === 404) || lower.includes('not found')) {
    return 'Data not found.';
  }
  if (msg.length > 60) {
    return `${prefix}: ${msg.slice(0, 57)}...`;
  }
  return `${prefix}: ${msg}`;
}
