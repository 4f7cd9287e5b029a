import { Response } from 'express';
import { ProjectService } from '../services/project.service';
import { AuthenticatedRequest, requireUser } from '../middleware/auth.middleware';
import { BadRequestError, asBadRequest } from '../middleware/error.middleware';
import { createProjectBodySchema, parseOrThrow } from '../utils/validation.utils';

/**
 * Projects Controller
 * Handles project creation/listing and the file lifecycle inside a project
 */
export class ProjectsController {
  private readonly projects: ProjectService;

  constructor(projects: ProjectService) {
    this.projects = projects;
  }

  /**
   * POST /projects
   * Body: { "project_name": "thesis" }
   */
  async createProject(req: AuthenticatedRequest, res: Response): Promise<void> {
    const user = requireUser(req);

    try {
      const body = parseOrThrow(createProjectBodySchema, req.body);
      const project = await this.projects.createProject(user.username, body.project_name);

      res.status(201).json({
        message: `Project '${project.name}' created successfully`,
        project,
      });
    } catch (error) {
      throw asBadRequest(error);
    }
  }

  /**
   * GET /projects
   */
  async listProjects(req: AuthenticatedRequest, res: Response): Promise<void> {
    const user = requireUser(req);
    res.status(200).json(await this.projects.listProjects(user.username));
  }

  /**
   * GET /projects/:name
   */
  async getProject(req: AuthenticatedRequest, res: Response): Promise<void> {
    const user = requireUser(req);
    res.status(200).json(await this.projects.getProject(user.username, req.params.name));
  }

  /**
   * GET /projects/:name/files
   */
  async listFiles(req: AuthenticatedRequest, res: Response): Promise<void> {
    const user = requireUser(req);
    res.status(200).json(await this.projects.listFiles(user.username, req.params.name));
  }

  /**
   * POST /upload/:project and POST /upload/:project/:folder
   * Raw request body is the file content; the name comes from ?filename=
   * or the X-Filename header. Folder defaults to temp.
   */
  async upload(req: AuthenticatedRequest, res: Response): Promise<void> {
    const user = requireUser(req);
    const folder = req.params.folder ?? 'temp';
    const filename = typeof req.query.filename === 'string' ? req.query.filename : req.get('X-Filename');

    if (!filename) {
      throw new BadRequestError('A filename is required (?filename= or X-Filename header)');
    }

    const content: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

    try {
      const stored = await this.projects.upload(user.username, req.params.project, folder, filename, content);

      res.status(201).json({
        message: `File '${stored.filename}' uploaded successfully to project '${req.params.project}'`,
        ...stored,
      });
    } catch (error) {
      throw asBadRequest(error);
    }
  }

  /**
   * GET /projects/:name/files/:file
   * Resolves main/ before temp/
   */
  async readFile(req: AuthenticatedRequest, res: Response): Promise<void> {
    const user = requireUser(req);

    try {
      const file = await this.projects.readFile(user.username, req.params.name, req.params.file);

      res.set('X-Folder', file.folder);
      res.attachment(req.params.file);
      res.status(200).send(file.content);
    } catch (error) {
      throw asBadRequest(error);
    }
  }

  /**
   * DELETE /projects/:name/files/:file
   */
  async deleteFile(req: AuthenticatedRequest, res: Response): Promise<void> {
    const user = requireUser(req);

    try {
      const folder = await this.projects.deleteFile(user.username, req.params.name, req.params.file);

      res.status(200).json({
        message: `File '${req.params.file}' deleted from ${folder}`,
        folder,
      });
    } catch (error) {
      throw asBadRequest(error);
    }
  }

  /**
   * POST /projects/:name/files/:file/move
   * Promote a staged file from temp/ to main/
   */
  async moveToMain(req: AuthenticatedRequest, res: Response): Promise<void> {
    const user = requireUser(req);

    try {
      await this.projects.moveToMain(user.username, req.params.name, req.params.file);

      res.status(200).json({
        message: `File '${req.params.file}' moved to main`,
      });
    } catch (error) {
      throw asBadRequest(error);
    }
  }
}
