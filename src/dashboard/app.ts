/**
 * Dashboard Express app. Created from its collaborators so tests can run
 * it with an in-process workflow and in-memory storage.
 */

import express, { Application } from 'express';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createRunsRouter, type RunsRouterOptions } from './routes/runs';

export type DashboardOptions = RunsRouterOptions;

export function createDashboardApp(options: DashboardOptions): Application {
  const app = express();

  app.use(requestLogger);
  app.use(express.json({ limit: '2mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/runs', createRunsRouter(options));

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
  });

  app.use(errorHandler);
  return app;
}
