import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';

/**
 * Custom error class with status code
 */
export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number = 500) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.isOperational = true; // Operational errors vs programming errors

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Common error types
 */
export class BadRequestError extends AppError {
  constructor(message: string = 'Bad Request') {
    super(message, 400);
    this.name = 'BadRequestError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, statusCode: number = 422) {
    super(message, statusCode);
    this.name = 'ValidationError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string = 'Conflict') {
    super(message, 409);
    this.name = 'ConflictError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Could not validate credentials') {
    super(message, 401);
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Not Found') {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message: string = 'Payload Too Large') {
    super(message, 413);
    this.name = 'PayloadTooLargeError';
  }
}

/**
 * The external LLM service could not be reached or answered with an error
 * that says nothing about the caller's input.
 */
export class ExternalServiceError extends AppError {
  constructor(message: string = 'External service unavailable') {
    super(message, 502);
    this.name = 'ExternalServiceError';
  }
}

/**
 * Unexpected filesystem failure (permissions, disk full, ...)
 */
export class StorageError extends AppError {
  constructor(message: string = 'Storage operation failed') {
    super(message, 500);
    this.name = 'StorageError';
  }
}

/**
 * A persisted record is missing required fields or is not valid JSON
 */
export class CorruptRecordError extends AppError {
  constructor(message: string = 'Corrupt record') {
    super(message, 500);
    this.name = 'CorruptRecordError';
  }
}

/**
 * Token failed signature, expiry or subject checks. Never sent to clients
 * as-is: the access gate turns it into an UnauthorizedError.
 */
export class InvalidTokenError extends AppError {
  constructor(message: string = 'Invalid token') {
    super(message, 401);
    this.name = 'InvalidTokenError';
  }
}

export interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  stack?: string;
}

/**
 * Error response formatter.
 * Server-side failures get a generic message so internal paths never leak.
 */
export function formatErrorResponse(error: AppError, includeStack: boolean = false): ErrorResponse {
  const internal = error.statusCode >= 500 && error.statusCode !== 502;
  const response: ErrorResponse = {
    error: error.name,
    message: internal ? 'Internal server error' : error.message,
    statusCode: error.statusCode,
  };

  if (includeStack && error.stack) {
    response.stack = error.stack;
  }

  return response;
}

/**
 * Normalize anything thrown into an AppError.
 * body-parser errors carry their own status (e.g. 413 for oversized bodies).
 */
export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) {
    return err;
  }

  if (err instanceof Error) {
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status === 413) {
      return new PayloadTooLargeError(err.message);
    }
    if (status >= 400 && status < 500) {
      return new BadRequestError(err.message);
    }
    const wrapped = new AppError(err.message, 500);
    wrapped.stack = err.stack;
    return wrapped;
  }

  return new AppError('Unknown error', 500);
}

/**
 * Build the global error handling middleware.
 * Must be registered after all routes.
 */
export function createErrorHandler(includeStack: boolean) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const error = toAppError(err);

    const meta = {
      method: req.method,
      url: req.url,
      statusCode: error.statusCode,
      kind: error.name,
      message: error.message,
    };

    if (error.statusCode >= 500) {
      logger.error('Error handling request:', { ...meta, stack: error.stack });
    } else {
      logger.warn('Request rejected:', meta);
    }

    if (error instanceof UnauthorizedError) {
      res.set('WWW-Authenticate', 'Bearer');
    }

    res.status(error.statusCode).json(formatErrorResponse(error, includeStack));
  };
}

/**
 * Async error wrapper
 * Wraps async route handlers to catch errors
 *
 * Usage:
 *   router.get('/path', asyncHandler(async (req, res) => {
 *     // async code
 *   }));
 */
export function asyncHandler<Req extends Request = Request>(
  fn: (req: Req, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Req, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
}

/**
 * 404 Not Found handler
 * Catches all unmatched routes
 */
export function notFoundHandler(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const error = new NotFoundError(
    `Route not found: ${req.method} ${req.path}`
  );
  next(error);
}

/**
 * Re-map client errors to 400 for endpoints whose contract reports every
 * rejected input as a bad request.
 */
export function asBadRequest(error: unknown): unknown {
  if (error instanceof ValidationError || error instanceof ConflictError) {
    error.statusCode = 400;
  }
  return error;
}
