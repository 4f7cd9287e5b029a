import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';
import { AccessGate } from '../services/access-gate.service';
import { UserRecord } from '../types/user.types';
import { UnauthorizedError } from './error.middleware';

/**
 * Extended Request interface with user information
 */
export interface AuthenticatedRequest extends Request {
  user?: UserRecord;
  token?: string;
}

/**
 * Pull the token out of "Authorization: Bearer <token>"
 */
export function extractBearerToken(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }

  const [scheme, token] = header.trim().split(/\s+/, 2);
  if (scheme.toLowerCase() !== 'bearer' || !token) {
    return undefined;
  }

  return token;
}

/**
 * Authentication middleware factory.
 * Resolves the bearer token through the access gate and attaches the user.
 */
export function createAuthenticate(gate: AccessGate) {
  return async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
    const token = extractBearerToken(req.get('Authorization'));

    let user: UserRecord;
    try {
      user = await gate.authenticate(token);
    } catch (error) {
      if (error instanceof UnauthorizedError) {
        logger.warn('Authentication failed', { url: req.originalUrl });
      }
      next(error);
      return;
    }

    req.user = user;
    req.token = token;
    logger.debug('Authentication successful', { username: user.username });
    next();
  };
}

/**
 * The user attached by the authentication middleware
 */
export function requireUser(req: AuthenticatedRequest): UserRecord {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
}
