/**
 * Server Entrypoint
 *
 * Builds the Hono app serving merge requests and starts it on Node.
 */

import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import { cors } from 'hono/cors';
import { ZodError } from 'zod';
import * as path from 'path';
import { initDatabase, closeDatabase, healthCheck as dbHealthCheck } from '../db';
import { models } from '../db/models';
import { eventBus } from '../events';
import { isAppError } from '../core/errors';
import { createServices, type Services } from '../services';
import { authMiddleware } from './middleware/auth';
import { createMergeRequestRoutes } from './routes/merge-requests';
import { createPipelineRoutes } from './routes/pipelines';
import { CliGitGateway } from './storage/git-cli';
import { getConfig, getCorsOrigins, getDbPoolConfig } from './config';
import { logger, metrics, metricsHandler, requestLogger } from './logger';

export interface AppOptions {
  corsOrigins?: string[];
  /** Reports the database state on /health */
  healthCheck?: () => Promise<{ ok: boolean; latency: number }>;
}

/**
 * Server instance
 */
export interface MergedeskServer {
  app: Hono;
  server: ServerType;
  services: Services;
  stop: () => Promise<void>;
}

/**
 * Create and configure the Hono app
 */
export function createApp(services: Services, options: AppOptions = {}): Hono {
  const app = new Hono();

  app.use('*', requestLogger({ skip: (c) => c.req.path === '/health' }));

  app.use('*', cors({
    origin: options.corsOrigins ?? [],
    allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
    credentials: true,
  }));

  app.use('*', authMiddleware(services.store.sessions, services.store.members));

  // Health check endpoint
  app.get('/health', async (c) => {
    const db = options.healthCheck ? await options.healthCheck() : null;

    return c.json({
      status: !db || db.ok ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      mergeQueue: services.worker.pending,
      ...(db ? { database: { connected: db.ok, latency: db.latency } } : {}),
    });
  });

  app.get('/metrics', metricsHandler);

  app.route('/', createMergeRequestRoutes(services));
  app.route('/', createPipelineRoutes(services));

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  // Error handler
  app.onError((err, c) => {
    if (isAppError(err)) {
      metrics.inc('http_errors_total', 1, { code: err.code });
      return c.json(err.toJSON(), err.status);
    }

    if (err instanceof ZodError) {
      return c.json(
        {
          error: 'Invalid parameters',
          code: 'VALIDATION_FAILED',
          issues: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
        },
        422
      );
    }

    logger.error('Unhandled error', {
      path: c.req.path,
      error: err.message,
      stack: err.stack,
    });
    metrics.inc('http_errors_total', 1, { code: 'INTERNAL' });
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}

/**
 * Start the server with the PostgreSQL store and the git binary
 */
export function startServer(): MergedeskServer {
  const config = getConfig();
  const { connectionString, ...pool } = getDbPoolConfig();

  if (!connectionString) {
    throw new Error('DATABASE_URL is required to start the server');
  }
  initDatabase({ connectionString, ...pool });

  const services = createServices({
    store: models,
    git: new CliGitGateway({ gitBin: config.GIT_BIN, reposDir: path.resolve(config.REPOS_DIR) }),
    eventBus,
    logger,
  });

  const app = createApp(services, {
    corsOrigins: getCorsOrigins(),
    healthCheck: dbHealthCheck,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info('Server listening', {
    url: `http://${config.HOST === '0.0.0.0' ? 'localhost' : config.HOST}:${config.PORT}`,
    reposDir: path.resolve(config.REPOS_DIR),
  });

  return {
    app,
    server,
    services,
    stop: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      await services.worker.drain();
      await closeDatabase();
      logger.info('Server stopped');
    },
  };
}
