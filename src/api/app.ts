import express, { type Express } from 'express';
import type { ApiContext } from '../context.js';
import { errorHandler, notFoundHandler, requestLogger } from './middleware.js';
import { createRouter } from './routes.js';

export function createApp(ctx: ApiContext): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  app.use('/api', createRouter(ctx));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
