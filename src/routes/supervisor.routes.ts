import { RequestHandler, Router } from 'express';
import { SupervisorController } from '../controllers/supervisor.controller';
import { asyncHandler } from '../middleware/error.middleware';

export function createSupervisorRoutes(controller: SupervisorController, authenticate: RequestHandler): Router {
  const router = Router();

  /**
   * POST /supervisor
   * Ask the language model about the caller's projects
   */
  router.post('/supervisor', authenticate, asyncHandler((req, res) => controller.contact(req, res)));

  return router;
}
