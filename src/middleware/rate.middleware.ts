import rateLimit from 'express-rate-limit';
import { Request, Response, NextFunction } from 'express';
import { UploadConfig } from '../types/config.types';

/**
 * Global rate limiter middleware (per-IP)
 * Used to mitigate DoS from repeated requests, including uploads.
 */
export function createGlobalRateLimiter(options: UploadConfig) {
  return rateLimit({
    windowMs: options.rateLimit.windowMs,
    max: options.rateLimit.max,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: 'TooManyRequests',
      message: 'Rate limit exceeded. Please try again later.',
      statusCode: 429,
    },
  });
}

/**
 * Targeted rate limiter for upload-like endpoints.
 * Can be applied specifically to routes that mutate server state.
 */
export function createUploadRateLimiter(options: UploadConfig) {
  return rateLimit({
    windowMs: options.rateLimit.windowMs,
    max: Math.max(5, Math.floor(options.rateLimit.max / 3)), // stricter for uploads
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: 'TooManyRequests',
      message: 'Upload rate limit exceeded. Please slow down.',
      statusCode: 429,
    },
  });
}

/**
 * Upload payload size guard.
 * Rejects requests whose Content-Length exceeds configured max bytes.
 */
export function createUploadSizeGuard(maxBytes: number) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const contentLength = req.headers['content-length'];
    if (contentLength) {
      const len = parseInt(contentLength, 10);
      if (!Number.isNaN(len) && len > maxBytes) {
        res.status(413).json({
          error: 'PayloadTooLargeError',
          message: `Upload exceeds limit of ${maxBytes} bytes`,
          statusCode: 413,
        });
        return;
      }
    }
    next();
  };
}
