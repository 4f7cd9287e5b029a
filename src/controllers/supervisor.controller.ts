import { Response } from 'express';
import { SupervisorService } from '../services/supervisor.service';
import { AuthenticatedRequest, requireUser } from '../middleware/auth.middleware';
import { parseOrThrow, supervisorBodySchema } from '../utils/validation.utils';

/**
 * Supervisor Controller
 * Relays a chat message to the language model using the caller's own key
 */
export class SupervisorController {
  private readonly supervisor: SupervisorService;

  constructor(supervisor: SupervisorService) {
    this.supervisor = supervisor;
  }

  /**
   * POST /supervisor
   * Body: { "message": "...", "project": "thesis" }
   */
  async contact(req: AuthenticatedRequest, res: Response): Promise<void> {
    const user = requireUser(req);
    const body = parseOrThrow(supervisorBodySchema, req.body, 400);

    const response = await this.supervisor.ask(user, body.message, body.project);

    res.status(200).json({ response });
  }
}
