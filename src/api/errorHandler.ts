import type { Request, Response, NextFunction } from 'express';
import { isAppError, RateLimitError, RequestError, type AppError } from '../domain/errors.js';
import { logger, redactSecrets } from '../infra/logger.js';
import type { Env } from '../infra/env.js';

const SENSITIVE_KEY_PATTERNS = [/secret/i, /token/i, /api[_-]?key/i, /auth/i, /credential/i];

/**
 * Drops values under sensitive-looking keys, then masks secrets inside strings
 */
export function redactRequestBody(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(redactRequestBody);
  }
  if (!obj || typeof obj !== 'object') {
    return redactSecrets(obj);
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    redacted[key] = SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key))
      ? '[REDACTED]'
      : redactRequestBody(value);
  }
  return redacted;
}

/**
 * HTTP status for a known application error
 */
export function statusForError(err: AppError): number {
  if (err instanceof RateLimitError) return 429;
  if (err instanceof RequestError && err.statusCode === 404) return 404;
  switch (err.code) {
    case 'VALIDATION_ERROR':
    case 'INVESTEC_INVALID_DATE':
      return 400;
    case 'CONFIG_ERROR':
      return 500;
    default:
      // Upstream API failures
      return 502;
  }
}

/**
 * Global error handler: maps domain errors to status codes and logs with redacted context
 */
export function createErrorHandler(env: Pick<Env, 'NODE_ENV'>) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const context = {
      method: req.method,
      path: req.path,
      ip: req.ip,
      userAgent: req.get('user-agent'),
      body: redactRequestBody(req.body),
    };

    if (isAppError(err)) {
      logger.error('Application error', {
        code: err.code,
        message: err.message,
        details: redactRequestBody(err.details),
        stack: env.NODE_ENV === 'development' ? err.stack : undefined,
        ...context,
      });

      res.status(statusForError(err)).json({
        error: err.code,
        message: err.message,
        ...(err.details ? { details: redactRequestBody(err.details) } : {}),
      });
    } else if (err.name === 'SyntaxError' && 'body' in err) {
      logger.warn('Invalid JSON in request', {
        message: err.message,
        ...context,
      });

      res.status(400).json({
        error: 'INVALID_JSON',
        message: 'Invalid JSON in request body',
      });
    } else {
      logger.error('Unexpected error', {
        message: err.message,
        name: err.name,
        stack: err.stack,
        ...context,
      });

      res.status(500).json({
        error: 'INTERNAL_SERVER_ERROR',
        message: env.NODE_ENV === 'development' ? err.message : 'An unexpected error occurred',
      });
    }
  };
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    error: 'NOT_FOUND',
    message: 'The requested resource was not found',
  });
}
