import winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { LoggingConfig } from '../types/config.types';

/**
 * Custom log format
 */
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let log = `${timestamp} [${level.toUpperCase()}]: ${message}`;

    // Add metadata if present
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }

    return log;
  })
);

/**
 * Winston logger instance.
 * Starts console-only; configureLogger() attaches file transports once the
 * application config is known.
 */
export const logger = winston.createLogger({
  level: 'info',
  format: logFormat,
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        logFormat
      ),
    }),
  ],
});

/**
 * Apply logging settings from the application config
 */
export function configureLogger(options: LoggingConfig): void {
  logger.level = options.level;
  logger.silent = options.silent;

  if (options.silent || !options.file) {
    return;
  }

  // Ensure logs directory exists
  const logDir = path.dirname(options.file);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  logger.add(
    new winston.transports.File({
      filename: options.file,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

/**
 * Log request details
 */
export function logRequest(
  method: string,
  url: string,
  statusCode: number,
  duration: number
): void {
  const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';

  logger.log(level, 'HTTP Request', {
    method,
    url,
    statusCode,
    duration: `${duration}ms`,
  });
}

/**
 * Log error with context
 */
export function logError(
  error: Error,
  context?: Record<string, unknown>
): void {
  logger.error(error.message, {
    stack: error.stack,
    ...context,
  });
}

