import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { AuthConfig } from '../types/config.types';
import { InvalidTokenError } from '../middleware/error.middleware';
import { logger } from '../utils/logger';

/** Milliseconds since the epoch */
export type Clock = () => number;

/**
 * Password hashing and bearer token codec.
 *
 * Tokens are stateless JWTs carrying only the username (`sub`) and an
 * expiry; nothing is persisted server-side, so a token stays valid until it
 * expires.
 */
export class AuthService {
  private readonly options: AuthConfig;
  private readonly clock: Clock;

  constructor(options: AuthConfig, clock: Clock = Date.now) {
    this.options = options;
    this.clock = clock;
  }

  /**
   * Hash a password with a per-hash random salt
   */
  async hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, this.options.bcryptRounds);
  }

  /**
   * Compare a password against a stored digest. Returns false on mismatch
   * and on digests bcrypt cannot parse.
   */
  async verifyPassword(password: string, digest: string): Promise<boolean> {
    try {
      return await bcrypt.compare(password, digest);
    } catch (error) {
      logger.warn('Password digest could not be compared', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return false;
    }
  }

  /**
   * Issue a signed token for a username.
   * Defaults to the configured lifetime (30 minutes unless overridden).
   */
  issueToken(username: string, ttlSeconds?: number): string {
    const issuedAt = this.nowSeconds();
    const lifetime = ttlSeconds ?? Math.round(this.options.accessTokenExpireMinutes * 60);

    const token = jwt.sign(
      { sub: username, iat: issuedAt, exp: issuedAt + lifetime },
      this.options.jwtSecret,
      { algorithm: this.options.jwtAlgorithm }
    );

    logger.debug(`Token issued for user: ${username}`, { expiresIn: `${lifetime}s` });
    return token;
  }

  /**
   * Resolve a token to its username.
   * Expired, tampered, malformed and subject-less tokens all raise the same
   * InvalidTokenError.
   */
  decodeToken(token: string): string {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.options.jwtSecret, {
        algorithms: [this.options.jwtAlgorithm],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      logger.debug('Token rejected', {
        reason: error instanceof Error ? error.name : 'Unknown error',
      });
      throw new InvalidTokenError();
    }

    if (typeof payload === 'string' || typeof payload.sub !== 'string' || payload.sub.length === 0) {
      throw new InvalidTokenError();
    }

    return payload.sub;
  }

  private nowSeconds(): number {
    return Math.floor(this.clock() / 1000);
  }
}
