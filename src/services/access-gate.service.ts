import { ApiKeyStatus, LoginResult, UserRecord } from '../types/user.types';
import {
  CorruptRecordError,
  InvalidTokenError,
  UnauthorizedError,
} from '../middleware/error.middleware';
import { logger } from '../utils/logger';
import { AuthService } from './auth.service';
import { ApiKeyService } from './apikey.service';
import { UserService } from './user.service';

const BAD_CREDENTIALS = 'Incorrect username or password';

/**
 * Moves callers between anonymous and authenticated.
 *
 * login() trades a username/password for a bearer token; authenticate()
 * resolves a bearer token back to an active user. Every rejection surfaces
 * as the same UnauthorizedError so callers cannot tell which check failed.
 */
export class AccessGate {
  private readonly auth: AuthService;
  private readonly users: UserService;
  private readonly apiKeys: ApiKeyService;

  constructor(auth: AuthService, users: UserService, apiKeys: ApiKeyService) {
    this.auth = auth;
    this.users = users;
    this.apiKeys = apiKeys;
  }

  async login(username: string, password: string, newApiKey?: string): Promise<LoginResult> {
    let user: UserRecord | null;
    try {
      user = await this.users.verifyCredentials(username, password);
    } catch (error) {
      if (error instanceof CorruptRecordError) {
        throw new UnauthorizedError(BAD_CREDENTIALS);
      }
      throw error;
    }

    if (!user || user.disabled) {
      logger.warn('Login rejected', { username });
      throw new UnauthorizedError(BAD_CREDENTIALS);
    }

    let apiKeyStale = false;
    let apiKeyUpdated = false;

    if (newApiKey) {
      user = await this.users.updateExternalKey(user.username, newApiKey);
      apiKeyUpdated = true;
    } else {
      const outcome = await this.apiKeys.probe(user.external_api_key);
      if (outcome === 'unavailable') {
        // Keep the last recorded verdict rather than block the login
        apiKeyStale = true;
      } else if (outcome !== user.api_key_status) {
        user = await this.recordKeyStatus(user, outcome);
      }
    }

    await this.users.touchLastLogin(user.username);
    const accessToken = this.auth.issueToken(user.username);

    logger.info(`User authenticated: ${user.username}`);
    return {
      user,
      accessToken,
      apiKeyStatus: user.api_key_status,
      apiKeyStale,
      apiKeyUpdated,
    };
  }

  /**
   * Best-effort: a failed write leaves the stored verdict behind but still
   * reports the fresh one
   */
  private async recordKeyStatus(user: UserRecord, status: ApiKeyStatus): Promise<UserRecord> {
    try {
      return await this.users.recordKeyStatus(user.username, status);
    } catch (error) {
      logger.warn('Could not record API key status', {
        username: user.username,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return { ...user, api_key_status: status };
    }
  }

  /**
   * Resolve a bearer token to an active user record
   */
  async authenticate(token: string | undefined): Promise<UserRecord> {
    if (!token) {
      throw new UnauthorizedError();
    }

    let username: string;
    try {
      username = this.auth.decodeToken(token);
    } catch (error) {
      if (error instanceof InvalidTokenError) {
        throw new UnauthorizedError();
      }
      throw error;
    }

    let user: UserRecord | null;
    try {
      user = await this.users.lookup(username);
    } catch (error) {
      if (error instanceof CorruptRecordError) {
        throw new UnauthorizedError();
      }
      throw error;
    }

    if (!user || user.disabled) {
      logger.warn('Token rejected for missing or disabled user', { username });
      throw new UnauthorizedError();
    }

    return user;
  }
}
