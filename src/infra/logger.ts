import winston from 'winston';
import type { Env } from './env.js';
import { isAppError } from '../domain/errors.js';

/**
 * Structured logger with secret redaction
 * Logs to console in development, file + console in production
 */

const SECRET_PATTERNS = [
  /password[=:]\s*["']?([^"'\s]+)/gi,
  /token[=:]\s*["']?([^"'\s]+)/gi,
  /secret[=:]\s*["']?([^"'\s]+)/gi,
];

const SECRET_KEYS = ['password', 'token', 'secret', 'authorization', 'apiKey'];

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

  if (obj && typeof obj === 'object' && !(obj instanceof Error) && !(obj instanceof Date)) {
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
 * Log meta for a caught value; an Error's message and stack are not
 * enumerable and would otherwise drop out of the JSON output
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      error: error.message,
      ...(isAppError(error) ? { code: error.code } : {}),
      stack: error.stack,
    };
  }
  return { error };
}

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level') continue;
    info[key] = SECRET_KEYS.includes(key) ? '***REDACTED***' : redactSecrets(info[key]);
  }
  return info;
})();

/**
 * Creates a Winston logger instance
 */
export function createLogger(env: Env): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
        })
      ),
    }),
  ];

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
    silent: env.NODE_ENV === 'test',
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
 * Global logger instance (initialized in server.ts)
 */
export let logger: winston.Logger;

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
