/**
 * Express application: middleware, routes and error handling.
 * index.ts adds the listener, workers and shutdown handling.
 */

import express from 'express';
import cors from 'cors';
import { getConfig } from './config.js';
import { authMiddleware } from './middleware/auth.js';
import { checkHealth } from './services/database.js';
import { formatErrorForLog, formatErrorForResponse, getErrorStatusCode } from './utils/errors.js';

// Routes
import datasetsRouter from './routes/datasets.js';
import downloadsRouter from './routes/downloads.js';
import updatesRouter from './routes/updates.js';

export const VERSION = '0.1.0';

export function createApp(): express.Express {
  const app = express();

  // Middleware
  app.use(cors({
    origin: getConfig().CORS_ORIGIN,
    credentials: true,
  }));
  app.use(express.json({ limit: '1mb' }));

  // Health check (no auth required)
  app.get('/health', async (req, res) => {
    const { healthy, error } = await checkHealth();
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      version: VERSION,
      ...(error && { error }),
    });
  });

  // Apply auth middleware to all /api/v1/* routes
  app.use('/api/v1', authMiddleware);

  app.use('/api/v1/datasets', datasetsRouter);
  app.use('/api/v1/downloads', downloadsRouter);
  app.use('/api/v1/updates', updatesRouter);

  // 404 handler for unknown routes
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      errors: [`Unknown endpoint: ${req.method} ${req.path}`],
    });
  });

  // Global error handler - returns REAL error details for debugging
  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const timestamp = new Date().toISOString();
    console.error(`\n[${timestamp}] UNHANDLED ERROR:`);
    console.error(`  Path: ${req.method} ${req.path}`);
    console.error(formatErrorForLog(err));

    // body-parser marks malformed JSON with a 4xx status
    const status = 'status' in err && typeof err.status === 'number' && err.status < 500
      ? err.status
      : getErrorStatusCode(err);

    res.status(status).json({
      success: false,
      errors: [formatErrorForResponse(err)],
    });
  });

  return app;
}
