import { config as loadEnv } from 'dotenv';
import { resolve } from 'path';
import { loadConfig } from './config.js';
import { createDb, createPool, pingDatabase } from './db/index.js';
import { createLogger } from './logger.js';
import { createApp } from './app.js';
import { DivisionService, DrizzleDivisionRepository } from './services/division/index.js';

// Nothing above reads the environment at import time; load .env before loadConfig runs
loadEnv({ path: resolve(process.cwd(), '.env') });
loadEnv({ path: resolve(process.cwd(), '../.env') });

const startServer = async () => {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  // Log DB connection info only in development
  if (config.env !== 'production') {
    logger.info('DB Config:', {
      host: config.database.host,
      port: config.database.port,
      database: config.database.name,
    });
  }

  const pool = createPool(config.database);
  pool.on('error', (err) => {
    logger.error('[db] Idle client error:', err.message);
  });

  const repository = new DrizzleDivisionRepository(createDb(pool));
  const service = new DivisionService(repository, logger);
  const app = createApp({
    config,
    service,
    checkDatabase: () => pingDatabase(pool),
  });

  const server = app.listen(config.port, '0.0.0.0', () => {
    logger.info(`🚀 Division API running on http://localhost:${config.port}`);
    logger.info(`📊 Health check: http://localhost:${config.port}/health`);
    logger.info(`🌳 API: http://localhost:${config.port}/api/divisions`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      pool.end()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error('Failed to close database pool:', err);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

startServer().catch((err: unknown) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
