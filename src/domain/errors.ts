/**
 * Application error types
 * Investec API failures form their own branch so callers can catch
 * "could not log in" apart from "logged in but the call was rejected"
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export interface ApiErrorOptions {
  code?: string;
  details?: unknown;
  cause?: unknown;
}

/**
 * Any Investec API failure not otherwise classified
 * (network failure, timeout, malformed JSON on a successful response)
 */
export class ApiError extends AppError {
  constructor(message: string, options: ApiErrorOptions = {}) {
    super(
      message,
      options.code ?? 'INVESTEC_API_ERROR',
      options.details,
      options.cause !== undefined ? { cause: options.cause } : undefined
    );
  }
}

/**
 * Access token acquisition failed
 */
export class AuthError extends ApiError {
  constructor(message: string, options: Omit<ApiErrorOptions, 'code'> = {}) {
    super(message, { ...options, code: 'INVESTEC_AUTH_ERROR' });
  }
}

/**
 * The API was reached but rejected the request
 */
export class RequestError extends ApiError {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly body?: unknown,
    code = 'INVESTEC_REQUEST_ERROR'
  ) {
    super(message, { code, details: { statusCode, body } });
  }
}

/**
 * HTTP 429 from the API. No retry happens here; callers decide.
 */
export class RateLimitError extends RequestError {
  constructor(message: string, statusCode: number, body?: unknown) {
    super(message, statusCode, body, 'INVESTEC_RATE_LIMITED');
  }
}

/**
 * Configuration errors - fail fast on startup
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details);
  }
}

/**
 * Validation errors from tool or request input
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
