/**
 * Application Factory
 *
 * Builds the Express app without binding a port, so tests can drive it in process.
 */

import express, { Express } from 'express';
import cors from 'cors';
import type { AppConfig } from './config';
import { createApiRouter } from './routes';
import { errorHandler, notFoundHandler } from './middleware';

export function createApp(config: AppConfig): Express {
  const app = express();
  app.locals.config = config;

  app.use(cors({ origin: config.corsOrigin }));

  app.use(createApiRouter());

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
