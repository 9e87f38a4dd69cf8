import path from 'node:path';
import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import type { RateLimiter } from '../middleware/rate-limiter.js';
import type { ErrorHandler } from '../monitoring/error-handler.js';
import type { HealthMonitor } from '../monitoring/health-monitor.js';
import type { StoreGateway } from '../store/store-gateway.js';
import { setupRoutes } from './routes/index.js';

export interface HttpAppOptions {
  gateway: StoreGateway;
  healthMonitor: HealthMonitor;
  errorHandler: ErrorHandler;
  urlPrefix: string;
  globalLimiter?: RateLimiter;
  writeLimiter?: RateLimiter;
  bodyLimit?: string;
  /** Directory holding index.html, error.html and other static files. */
  publicDir?: string;
}

/**
 * Assemble the express application for the HTTP service.
 */
export function createHttpApp(options: HttpAppOptions): Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: options.bodyLimit ?? '1mb' }));
  app.use(express.urlencoded({ extended: false, limit: options.bodyLimit ?? '1mb' }));

  // Global rate limiting
  if (options.globalLimiter) {
    app.use(options.globalLimiter.middleware());
  }

  setupRoutes(app, options.urlPrefix, {
    gateway: options.gateway,
    healthMonitor: options.healthMonitor,
    errorHandler: options.errorHandler,
    writeLimiter: options.writeLimiter,
  });

  const publicDir = options.publicDir === undefined ? undefined : path.resolve(options.publicDir);
  if (publicDir) {
    app.use(express.static(publicDir));
  }

  // 404 handler: the error page for browsers, the JSON envelope for everyone else
  app.use('*', (req: Request, res: Response, next: NextFunction) => {
    if (publicDir && req.accepts(['json', 'html']) === 'html') {
      res.status(404).sendFile(path.join(publicDir, 'error.html'), (error) => {
        if (error) next(error);
      });
      return;
    }
    res.status(404).json({
      success: false,
      error: 'NOT_FOUND',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      timestamp: new Date().toISOString(),
    });
  });

  // Error handling middleware (must be last)
  app.use(options.errorHandler.middleware());

  return app;
}
