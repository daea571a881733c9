import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';

import { AdminController } from './controllers/admin.controller.js';
import { AssistantController } from './controllers/assistant.controller.js';
import { AuthController } from './controllers/auth.controller.js';
import { VacationController } from './controllers/vacation.controller.js';
import { getDocumentStore } from './db/index.js';
import { createAdminRouter } from './routes/admin.routes.js';
import { createAssistantRouter } from './routes/assistant.routes.js';
import { createAuthRouter } from './routes/auth.routes.js';
import { createCacheRouter } from './routes/cache.routes.js';
import { createEmployeeRouter } from './routes/employee.routes.js';
import { createVacationRouter } from './routes/vacation.routes.js';
import { AdminService } from './services/admin.service.js';
import { AssistantService } from './services/assistant.service.js';
import { getCompletionClient, type CompletionClient } from './services/completion.service.js';
import { RecordStore } from './services/recordStore.service.js';
import { createSnapshotCache } from './services/snapshot.service.js';
import { VacationService } from './services/vacation.service.js';
import type { DocumentStore } from './types/store.js';
import type { CivilDate } from './types/vacation.js';
import { AppError } from './utils/errors.js';
import { HTTP_STATUS, sendError } from './utils/http.js';

/**
 * Collaborators the application is wired with; each falls back to the
 * configured production implementation
 */
export interface AppDependencies {
  readonly documentStore?: DocumentStore;
  readonly completionClient?: CompletionClient;
  /**
   * Snapshot freshness window in milliseconds
   */
  readonly snapshotTtlMs?: number;
  /**
   * Clock for request dates
   */
  readonly today?: () => CivilDate;
}

/**
 * body-parser errors carry the HTTP status they should produce
 */
function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    'type' in err &&
    typeof err.type === 'string'
  );
}

/**
 * Create and configure Express application
 *
 * Sets up middleware, routes, and error handling for the vacation desk:
 * authentication, vacation requests and decisions, employee balances,
 * policy administration and the vacation assistant.
 */
export function createApp(deps: AppDependencies = {}): Express {
  const app = express();

  const recordStore = new RecordStore(deps.documentStore ?? getDocumentStore());
  const snapshotCache = createSnapshotCache(recordStore, deps.snapshotTtlMs);
  const vacationService = new VacationService(recordStore, snapshotCache, deps.today);
  const adminService = new AdminService(recordStore, snapshotCache);
  const assistantService = new AssistantService(snapshotCache, deps.completionClient ?? getCompletionClient());

  const vacationController = new VacationController(vacationService);

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Request logging middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      console.log(`[${new Date().toISOString()}] ${req.method} ${req.path} ${res.statusCode} ${duration}ms`);
    });
    next();
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      assistantEnabled: assistantService.enabled,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // API Routes
  app.use('/api/auth', createAuthRouter(new AuthController()));
  app.use('/api/vacations', createVacationRouter(vacationController));
  app.use('/api/employees', createEmployeeRouter(vacationController));
  app.use('/api/admin', createAdminRouter(new AdminController(adminService)));
  app.use('/api/assistant', createAssistantRouter(new AssistantController(assistantService)));
  app.use('/api/cache', createCacheRouter(snapshotCache));

  // 404 handler
  app.use((req: Request, res: Response) => {
    sendError(res, HTTP_STATUS.NOT_FOUND, 'NOT_FOUND', `Route ${req.method} ${req.path} not found`);
  });

  // Global error handler
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (isBodyParserError(err) && err.status < 500) {
      sendError(res, err.status, 'VALIDATION_ERROR', err.type === 'entity.parse.failed' ? 'Malformed JSON body' : err.message);
      return;
    }

    console.error('[ERROR]', {
      path: req.path,
      method: req.method,
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
      timestamp: new Date().toISOString(),
    });

    if (err instanceof AppError) {
      sendError(res, err.statusCode, err.code, err.message, err.details);
      return;
    }

    sendError(res, HTTP_STATUS.INTERNAL_SERVER_ERROR, 'INTERNAL_ERROR', 'An unexpected error occurred');
  });

  return app;
}
