// API layer: Express app configuration
// Composes all middleware and routes

import express, { type Application, type Request, type Response } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { errorHandler } from './middleware/errorHandler.js';
import { createSessionRouter } from './routes/sessions.js';
import type { SessionRegistry } from '@/application/game/SessionRegistry.js';

export interface AppOptions {
  registry: SessionRegistry;
  trustProxy?: boolean;
  /** morgan format; false disables access logs */
  logFormat?: string | false;
}

export function createApp(options: AppOptions): Application {
  const app = express();

  const {
    trustProxy = false,
    logFormat = process.env.NODE_ENV === 'production' ? 'combined' : 'dev',
  } = options;

  // Trust proxy (for proper client IP behind reverse proxy)
  if (trustProxy) {
    app.set('trust proxy', 1);
  }

  app.use(helmet({
    contentSecurityPolicy: false, // JSON API only
  }));

  if (logFormat) {
    app.use(morgan(logFormat));
  }

  app.use(express.json({ limit: '100kb' }));

  // Health check (before routes)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      sessions: options.registry.size,
    });
  });

  app.use('/api/sessions', createSessionRouter(options.registry));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Resource not found',
      },
    });
  });

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
