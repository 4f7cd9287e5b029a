import express, { RequestHandler, Router } from 'express';
import { ProjectsController } from '../controllers/projects.controller';
import { asyncHandler } from '../middleware/error.middleware';
import { UploadConfig } from '../types/config.types';
import { createUploadRateLimiter } from '../middleware/rate.middleware';

/**
 * Project and file routes. Every route requires a bearer token.
 */
export function createProjectRoutes(controller: ProjectsController, authenticate: RequestHandler): Router {
  const router = Router();

  /**
   * POST /projects
   * Create a project with empty main/ and temp/ folders
   */
  router.post('/projects', authenticate, asyncHandler((req, res) => controller.createProject(req, res)));

  /**
   * GET /projects
   * List the caller's projects, newest first
   */
  router.get('/projects', authenticate, asyncHandler((req, res) => controller.listProjects(req, res)));

  /**
   * GET /projects/:name
   */
  router.get('/projects/:name', authenticate, asyncHandler((req, res) => controller.getProject(req, res)));

  /**
   * GET /projects/:name/files
   * File names in main/ and temp/
   */
  router.get('/projects/:name/files', authenticate, asyncHandler((req, res) => controller.listFiles(req, res)));

  /**
   * GET /projects/:name/files/:file
   * Download a file (main/ wins over temp/)
   */
  router.get(
    '/projects/:name/files/:file',
    authenticate,
    asyncHandler((req, res) => controller.readFile(req, res))
  );

  /**
   * DELETE /projects/:name/files/:file
   */
  router.delete(
    '/projects/:name/files/:file',
    authenticate,
    asyncHandler((req, res) => controller.deleteFile(req, res))
  );

  /**
   * POST /projects/:name/files/:file/move
   * Promote a staged upload to main/
   */
  router.post(
    '/projects/:name/files/:file/move',
    authenticate,
    asyncHandler((req, res) => controller.moveToMain(req, res))
  );

  return router;
}

/**
 * Upload routes. The request body is the raw file content, so these are
 * mounted ahead of the JSON and form parsers.
 */
export function createUploadRoutes(
  controller: ProjectsController,
  authenticate: RequestHandler,
  options: UploadConfig
): Router {
  const router = Router();
  const uploadLimiter = createUploadRateLimiter(options);
  const rawBody = express.raw({ type: () => true, limit: options.maxBytes });

  /**
   * POST /upload/:project
   * POST /upload/:project/:folder
   * Folder is main or temp (default temp). Filename from ?filename= or X-Filename.
   */
  router.post(
    ['/upload/:project', '/upload/:project/:folder'],
    uploadLimiter,
    authenticate,
    rawBody,
    asyncHandler((req, res) => controller.upload(req, res))
  );

  return router;
}
