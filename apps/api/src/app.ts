import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { ErrorResponse } from '@underwriter/shared';
import { AppError, createNotFoundError } from './lib/errors.js';
import { analyzeRoutes } from './routes/analyze.js';
import { writingsRoutes } from './routes/writings.js';
import { flowRoutes } from './routes/flow.js';
import { rubricsRoutes } from './routes/rubrics.js';

export interface AppOptions {
  corsOrigin: string;
  requestLogging?: boolean;
}

export const createApp = (options: AppOptions) => {
  const app = new Hono();

  // Global middleware
  if (options.requestLogging ?? true) {
    app.use('*', logger());
  }
  app.use('/api/*', cors({
    origin: options.corsOrigin,
    allowHeaders: ['Content-Type'],
    allowMethods: ['GET', 'POST', 'OPTIONS'],
  }));

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }));

  // API routes
  app.route('/api/analyze', analyzeRoutes);
  app.route('/api/writings', writingsRoutes);
  app.route('/api/flow', flowRoutes);
  app.route('/api/rubrics', rubricsRoutes);

  app.notFound((c) => {
    const err = createNotFoundError('Route');
    const body: ErrorResponse = { error: err.message, code: err.code };
    return c.json(body, err.statusCode);
  });

  app.onError((err, c) => {
    if (err instanceof AppError) {
      const body: ErrorResponse = { error: err.message, code: err.code };
      return c.json(body, err.statusCode);
    }
    console.error('[Server] Unhandled error:', err);
    const body: ErrorResponse = { error: 'Internal Server Error' };
    return c.json(body, 500);
  });

  return app;
};
