import { z } from 'zod';
import { TreeStore } from '../storage/store.types';
import { ApiKeyStatus, NewUser, UserRecord } from '../types/user.types';
import {
  AppError,
  ConflictError,
  CorruptRecordError,
  NotFoundError,
} from '../middleware/error.middleware';
import {
  USERNAME_PATTERN,
  apiKeySchema,
  parseOrThrow,
  passwordSchema,
  usernameSchema,
} from '../utils/validation.utils';
import { logError, logger } from '../utils/logger';
import { AuthService, Clock } from './auth.service';
import { ApiKeyService } from './apikey.service';

export const CREDENTIALS_FILE = 'credentials.json';
export const PROJECTS_DIR = 'projects';

const userRecordSchema = z.object({
  username: z.string().regex(USERNAME_PATTERN),
  email: z.string().nullable().default(null),
  full_name: z.string().default(''),
  hashed_password: z.string().min(1),
  external_api_key: z.string(),
  api_key_status: z.enum(['valid', 'invalid']).default('valid'),
  api_key_checked_at: z.string().default(''),
  disabled: z.boolean().default(false),
  created_at: z.string().default(''),
  last_login: z.string().nullable().default(null),
});

/**
 * Credential store.
 *
 * One directory per user under the users root, holding credentials.json
 * and the user's projects/ namespace. The directory is created exclusively,
 * which is what makes usernames unique.
 */
export class UserService {
  private readonly store: TreeStore;
  private readonly auth: AuthService;
  private readonly apiKeys: ApiKeyService;
  private readonly clock: Clock;

  constructor(store: TreeStore, auth: AuthService, apiKeys: ApiKeyService, clock: Clock = Date.now) {
    this.store = store;
    this.auth = auth;
    this.apiKeys = apiKeys;
    this.clock = clock;
  }

  /**
   * Registration flow: format checks, availability, key probe, then create.
   * The probe runs after the cheap checks so a taken username never costs
   * an external request.
   */
  async register(input: NewUser): Promise<UserRecord> {
    this.validateNewUser(input);

    if ((await this.store.kind([input.username])) !== null) {
      throw new ConflictError('Username already exists');
    }

    await this.apiKeys.assertValid(input.apiKey);
    return this.create(input);
  }

  /**
   * Persist a new user and provision an empty project namespace.
   * Partially created state is removed before any error propagates.
   */
  async create(input: NewUser): Promise<UserRecord> {
    this.validateNewUser(input);

    const hashedPassword = await this.auth.hashPassword(input.password);
    const now = this.timestamp();
    const record: UserRecord = {
      username: input.username,
      email: input.email ?? null,
      full_name: '',
      hashed_password: hashedPassword,
      external_api_key: input.apiKey.trim(),
      api_key_status: 'valid',
      api_key_checked_at: now,
      disabled: false,
      created_at: now,
      last_login: null,
    };

    try {
      await this.store.makeDirectory([input.username], { exclusive: true });
    } catch (error) {
      if (error instanceof ConflictError) {
        throw new ConflictError('Username already exists');
      }
      throw error;
    }

    try {
      await this.store.makeDirectory([input.username, PROJECTS_DIR], { exclusive: true });
      await this.store.writeFile(
        [input.username, CREDENTIALS_FILE],
        JSON.stringify(record, null, 2),
        { exclusive: true }
      );
    } catch (error) {
      await this.rollback(input.username);
      throw error;
    }

    logger.info(`User created: ${input.username}`);
    return record;
  }

  /**
   * Read a user record. Returns null when the user does not exist.
   */
  async lookup(username: string): Promise<UserRecord | null> {
    if (!USERNAME_PATTERN.test(username)) {
      return null;
    }

    let raw: Buffer;
    try {
      raw = await this.store.readFile([username, CREDENTIALS_FILE]);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return null;
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw.toString('utf-8'));
    } catch (error) {
      logger.error('Credentials record is not valid JSON', {
        username,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw new CorruptRecordError(`Corrupt credentials record for ${username}`);
    }

    const parsed = userRecordSchema.safeParse(data);
    if (!parsed.success || parsed.data.username !== username) {
      logger.error('Credentials record is missing required fields', {
        username,
        issues: parsed.success ? ['username mismatch'] : parsed.error.issues.map((issue) => issue.path.join('.')),
      });
      throw new CorruptRecordError(`Corrupt credentials record for ${username}`);
    }

    return parsed.data;
  }

  /**
   * Check a username/password pair. Returns null for unknown users and wrong
   * passwords alike.
   */
  async verifyCredentials(username: string, password: string): Promise<UserRecord | null> {
    const user = await this.lookup(username);
    if (!user) {
      return null;
    }

    const matches = await this.auth.verifyPassword(password, user.hashed_password);
    return matches ? user : null;
  }

  /**
   * Replace the stored key after a successful probe
   */
  async updateExternalKey(username: string, newKey: string): Promise<UserRecord> {
    const key = parseOrThrow(apiKeySchema, newKey, 400);
    await this.apiKeys.assertValid(key);

    const user = await this.requireUser(username);
    const updated: UserRecord = {
      ...user,
      external_api_key: key,
      api_key_status: 'valid',
      api_key_checked_at: this.timestamp(),
    };
    await this.save(updated);

    logger.info(`External API key updated for user: ${username}`);
    return updated;
  }

  /**
   * Store the latest probe verdict for the user's current key
   */
  async recordKeyStatus(username: string, status: ApiKeyStatus): Promise<UserRecord> {
    const user = await this.requireUser(username);
    const updated: UserRecord = {
      ...user,
      api_key_status: status,
      api_key_checked_at: this.timestamp(),
    };
    await this.save(updated);
    return updated;
  }

  /**
   * Best-effort last_login update; failures are logged and swallowed
   */
  async touchLastLogin(username: string): Promise<void> {
    try {
      const user = await this.requireUser(username);
      await this.save({ ...user, last_login: this.timestamp() });
    } catch (error) {
      logError(error instanceof Error ? error : new Error(String(error)), {
        operation: 'touchLastLogin',
        username,
      });
    }
  }

  private validateNewUser(input: NewUser): void {
    parseOrThrow(usernameSchema, input.username);
    parseOrThrow(passwordSchema, input.password);
    parseOrThrow(apiKeySchema, input.apiKey);
  }

  private async requireUser(username: string): Promise<UserRecord> {
    const user = await this.lookup(username);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return user;
  }

  private async save(record: UserRecord): Promise<void> {
    await this.store.writeFile([record.username, CREDENTIALS_FILE], JSON.stringify(record, null, 2));
  }

  private async rollback(username: string): Promise<void> {
    try {
      await this.store.remove([username], { recursive: true });
      logger.warn(`Rolled back partially created user: ${username}`);
    } catch (error) {
      logger.error(`Rollback failed for user: ${username}`, {
        error: error instanceof AppError ? error.message : 'Unknown error',
      });
    }
  }

  private timestamp(): string {
    return new Date(this.clock()).toISOString();
  }
}
