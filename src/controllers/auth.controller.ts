import { Request, Response } from 'express';
import { AccessGate } from '../services/access-gate.service';
import { UserService } from '../services/user.service';
import { AuthenticatedRequest, requireUser } from '../middleware/auth.middleware';
import { toUserProfile } from '../types/user.types';
import {
  loginBodySchema,
  parseOrThrow,
  registerBodySchema,
  updateApiKeyBodySchema,
} from '../utils/validation.utils';
import { logger } from '../utils/logger';

/**
 * Auth Controller
 * Handles login, registration and the current user's profile and API key
 */
export class AuthController {
  private readonly gate: AccessGate;
  private readonly users: UserService;

  constructor(gate: AccessGate, users: UserService) {
    this.gate = gate;
    this.users = users;
  }

  /**
   * POST /token
   * Exchange username + password for a bearer token.
   *
   * Accepts JSON or an OAuth2 password form. A new external API key can be
   * supplied as `new_api_key` (or the form's `scope` field); it is probed
   * and stored before the token is issued.
   *
   * Response:
   * { "access_token": "...", "token_type": "bearer", "message": "...", "api_key_status": "valid" }
   */
  async login(req: Request, res: Response): Promise<void> {
    const body = parseOrThrow(loginBodySchema, req.body, 400);
    const newApiKey = body.new_api_key || body.scope || undefined;

    const result = await this.gate.login(body.username, body.password, newApiKey);

    let message = 'Login successful';
    if (result.apiKeyUpdated) {
      message += '. External API key updated.';
    } else if (result.apiKeyStatus === 'invalid') {
      message += '. Existing external API key is invalid. Please update it.';
    }

    res.status(200).json({
      access_token: result.accessToken,
      token_type: 'bearer',
      message,
      api_key_status: result.apiKeyStatus,
      api_key_stale: result.apiKeyStale,
    });
  }

  /**
   * POST /register
   * Create an account. The external API key is probed first.
   */
  async register(req: Request, res: Response): Promise<void> {
    const body = parseOrThrow(registerBodySchema, req.body);

    const user = await this.users.register({
      username: body.username,
      password: body.password,
      apiKey: body.api_key,
      email: body.email,
    });

    res.status(201).json({
      message: 'User registered successfully',
      user: toUserProfile(user),
    });
    logger.info(`User registered: ${user.username}`);
  }

  /**
   * GET /users/me
   */
  async me(req: AuthenticatedRequest, res: Response): Promise<void> {
    res.status(200).json(toUserProfile(requireUser(req)));
  }

  /**
   * GET /users/me/api_key
   */
  async getApiKey(req: AuthenticatedRequest, res: Response): Promise<void> {
    const user = requireUser(req);
    res.status(200).json({
      api_key: user.external_api_key,
      api_key_status: user.api_key_status,
    });
  }

  /**
   * POST /users/me/update_api_key
   * 400 when the new key does not pass the probe
   */
  async updateApiKey(req: AuthenticatedRequest, res: Response): Promise<void> {
    const user = requireUser(req);
    const body = parseOrThrow(updateApiKeyBodySchema, req.body, 400);

    await this.users.updateExternalKey(user.username, body.new_api_key);

    res.status(200).json({ message: 'API key updated successfully' });
  }
}
