import 'express-async-errors';
import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { AppConfig } from './config.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createRoutes, type RouteDependencies } from './routes/index.js';

export interface AppDependencies extends RouteDependencies {
  config: Pick<AppConfig, 'corsOrigin'>;
}

/**
 * Build the Express app. Owns no resources: the caller creates the database
 * handle and the service and decides when to listen.
 */
export function createApp({ config, service, checkDatabase }: AppDependencies): Express {
  const app = express();

  // Security middleware
  app.use(helmet({
    hsts: {
      maxAge: 31536000, // 1 year in seconds
      includeSubDomains: true,
      preload: true,
    },
  }));
  app.use(cors({
    origin: config.corsOrigin,
    credentials: true,
  }));

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Routes
  app.use(createRoutes({ service, checkDatabase }));

  // Error handling (must be last)
  app.use(errorHandler);

  return app;
}
