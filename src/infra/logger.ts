import winston from 'winston';
import type { Env } from './env.js';

/**
 * Structured logger with secret redaction
 * Console output goes to stderr: stdout carries the MCP stdio protocol
 */

const SECRET_PATTERNS = [
  /client[_-]?secret[=:]\s*["']?([^"'\s&]+)/gi,
  /api[_-]?key[=:]\s*["']?([^"'\s&]+)/gi,
  /access[_-]?token[=:]\s*["']?([^"'\s&]+)/gi,
  /Bearer\s+([A-Za-z0-9._~+/=-]+)/g,
  /Basic\s+([A-Za-z0-9+/=]+)/g,
];

const SECRET_KEYS = [
  'clientSecret',
  'apiKey',
  'accessToken',
  'access_token',
  'authorization',
  'Authorization',
  'x-api-key',
];

const ALL_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

/**
 * Redacts sensitive information from log messages
 */
export function redactSecrets(obj: unknown): unknown {
  if (typeof obj === 'string') {
    let redacted = obj;
    SECRET_PATTERNS.forEach((pattern) => {
      redacted = redacted.replace(pattern, (match: string, secret: string) => {
        return match.replace(secret, '***REDACTED***');
      });
    });
    return redacted;
  }

  if (Array.isArray(obj)) {
    return obj.map(redactSecrets);
  }

  if (obj && typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (SECRET_KEYS.includes(key)) {
        redacted[key] = '***REDACTED***';
      } else {
        redacted[key] = redactSecrets(value);
      }
    }
    return redacted;
  }

  return obj;
}

/**
 * Custom format that redacts secrets in the message and metadata
 */
const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level') continue;
    info[key] = SECRET_KEYS.includes(key) ? '***REDACTED***' : redactSecrets(info[key]);
  }
  return info;
})();

function consoleTransport(): winston.transport {
  return new winston.transports.Console({
    stderrLevels: ALL_LEVELS,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
      })
    ),
  });
}

/**
 * Creates a Winston logger instance
 */
export function createLogger(env: Pick<Env, 'NODE_ENV' | 'LOG_LEVEL' | 'LOG_FILE'>): winston.Logger {
  const transports: winston.transport[] = [consoleTransport()];

  // Add file transport in production
  if (env.NODE_ENV === 'production' && env.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: env.LOG_FILE,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: env.LOG_LEVEL,
    format: winston.format.combine(
      redactFormat,
      winston.format.errors({ stack: true }),
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports,
    exitOnError: false,
  });
}

/**
 * Process logger; replaced in server.ts once the environment is validated
 */
export let logger: winston.Logger = createLogger({
  NODE_ENV: 'development',
  LOG_LEVEL: 'info',
  LOG_FILE: undefined,
});

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
