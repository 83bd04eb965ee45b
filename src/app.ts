/**
 * @fileoverview Express application for the dispatcher HTTP API.
 *
 * Built from a DispatcherService so the same app is served by the entry
 * point and exercised by integration tests without listening on a port.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import type { DispatcherService } from './bootstrap.js';
import { createAgentsRouter } from './routes/agents.js';
import { createDispatchRouter } from './routes/dispatch.js';
import { createSessionsRouter } from './routes/sessions.js';
import { createHealthHandler } from './routes/health.js';
import { ValidationError } from './utils/errors.js';
import { sendError } from './routes/errors.js';

export function createApp(service: DispatcherService): express.Application {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', createHealthHandler(service.dispatcher));
  app.use(createAgentsRouter(service.dispatcher));
  app.use(createDispatchRouter(service.dispatcher));
  app.use(createSessionsRouter(service.dispatcher));

  // Malformed JSON bodies surface here from express.json().
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      sendError(res, new ValidationError('Request body is not valid JSON'));
      return;
    }
    sendError(res, error);
  });

  return app;
}
