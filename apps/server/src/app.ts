import express, { type Express } from 'express';
import cors from 'cors';
import type { TodoDb } from '@todo/core';
import { createHealthRouter } from './routes/health.js';
import { createTasksRouter } from './routes/tasks.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';

/**
 * Build the HTTP application around an initialized database.
 * The schema must already exist (see `initSchema`).
 */
export function createApp(db: TodoDb): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(requestLogger());
  // Every origin, method and header; the deployment boundary handles trust.
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json());

  app.use('/', createHealthRouter());
  app.use('/tasks', createTasksRouter(db));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
