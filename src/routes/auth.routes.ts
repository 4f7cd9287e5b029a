import { RequestHandler, Router } from 'express';
import { AuthController } from '../controllers/auth.controller';
import { asyncHandler } from '../middleware/error.middleware';

/**
 * Account routes: login, registration and the caller's own profile
 */
export function createAuthRoutes(controller: AuthController, authenticate: RequestHandler): Router {
  const router = Router();

  /**
   * POST /token
   * Login endpoint - returns a bearer token.
   * Accepts a JSON body or an OAuth2 password form.
   */
  router.post('/token', asyncHandler((req, res) => controller.login(req, res)));

  /**
   * POST /register
   * Open registration; the external API key must pass a live probe
   */
  router.post('/register', asyncHandler((req, res) => controller.register(req, res)));

  /**
   * GET /users/me
   * Profile of the authenticated user (no password digest, no API key)
   */
  router.get('/users/me', authenticate, asyncHandler((req, res) => controller.me(req, res)));

  /**
   * GET /users/me/api_key
   * The stored external API key
   */
  router.get('/users/me/api_key', authenticate, asyncHandler((req, res) => controller.getApiKey(req, res)));

  /**
   * POST /users/me/update_api_key
   * Replace the stored external API key after probing the new one
   */
  router.post(
    '/users/me/update_api_key',
    authenticate,
    asyncHandler((req, res) => controller.updateApiKey(req, res))
  );

  return router;
}
