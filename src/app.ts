import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { AppConfig } from './types/config.types';
import { FileSystemTreeStore } from './storage/filesystem.store';
import { AuthService, Clock } from './services/auth.service';
import { ApiKeyService } from './services/apikey.service';
import { LlmClient, OpenAiCompatibleClient } from './services/llm.service';
import { UserService } from './services/user.service';
import { ProjectService } from './services/project.service';
import { AccessGate } from './services/access-gate.service';
import { SupervisorService } from './services/supervisor.service';
import { AuthController } from './controllers/auth.controller';
import { ProjectsController } from './controllers/projects.controller';
import { SupervisorController } from './controllers/supervisor.controller';
import { createAuthRoutes } from './routes/auth.routes';
import { createProjectRoutes, createUploadRoutes } from './routes/projects.routes';
import { createSupervisorRoutes } from './routes/supervisor.routes';
import { createAuthenticate } from './middleware/auth.middleware';
import { createGlobalRateLimiter, createUploadSizeGuard } from './middleware/rate.middleware';
import { createErrorHandler, notFoundHandler } from './middleware/error.middleware';
import { logger, logRequest } from './utils/logger';

export interface ServiceOverrides {
  llmClient?: LlmClient;
  clock?: Clock;
}

export interface Services {
  config: AppConfig;
  store: FileSystemTreeStore;
  auth: AuthService;
  apiKeys: ApiKeyService;
  users: UserService;
  projects: ProjectService;
  gate: AccessGate;
  supervisor: SupervisorService;
}

/**
 * Wire every component from one configuration.
 * Tests swap in a fake LLM client and a controllable clock.
 */
export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const clock = overrides.clock ?? Date.now;
  const llmClient = overrides.llmClient ?? new OpenAiCompatibleClient(config.llm);

  const store = new FileSystemTreeStore(config.usersDir);
  const auth = new AuthService(config.auth, clock);
  const apiKeys = new ApiKeyService(llmClient, config.llm, clock);
  const users = new UserService(store, auth, apiKeys, clock);
  const projects = new ProjectService(store, clock);
  const gate = new AccessGate(auth, users, apiKeys);
  const supervisor = new SupervisorService(llmClient, projects);

  return { config, store, auth, apiKeys, users, projects, gate, supervisor };
}

/**
 * Create and configure Express application
 */
export function createApp(services: Services): Application {
  const { config } = services;
  const app = express();

  // ============================================
  // Security Middleware
  // ============================================

  app.use(
    helmet({
      contentSecurityPolicy: false, // Disable CSP for API
      crossOriginEmbedderPolicy: false,
    })
  );

  // ============================================
  // DoS Mitigations (Rate Limit & Size Guard)
  // ============================================

  app.use(createGlobalRateLimiter(config.upload));
  app.use(createUploadSizeGuard(config.upload.maxBytes));

  app.use(
    cors({
      origin: '*',
      methods: ['GET', 'POST', 'DELETE'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Filename'],
      exposedHeaders: ['Content-Disposition', 'X-Folder'],
    })
  );

  // ============================================
  // Request Logging Middleware
  // ============================================

  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    res.on('finish', () => {
      logRequest(req.method, req.originalUrl, res.statusCode, Date.now() - startTime);
    });

    next();
  });

  // ============================================
  // Health Check
  // ============================================

  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  // ============================================
  // API Routes
  // ============================================

  const authenticate = createAuthenticate(services.gate);
  const authController = new AuthController(services.gate, services.users);
  const projectsController = new ProjectsController(services.projects);
  const supervisorController = new SupervisorController(services.supervisor);

  // Uploads read the raw body, so they sit ahead of the JSON/form parsers
  app.use('/', createUploadRoutes(projectsController, authenticate, config.upload));

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false, limit: '1mb' }));

  app.use('/', createAuthRoutes(authController, authenticate));
  app.use('/', createProjectRoutes(projectsController, authenticate));
  app.use('/', createSupervisorRoutes(supervisorController, authenticate));

  // ============================================
  // Error Handling
  // ============================================

  // 404 handler (must be after all routes)
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(createErrorHandler(config.nodeEnv === 'development'));

  logger.debug('Express application configured');

  return app;
}
