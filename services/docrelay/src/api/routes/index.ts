import type { Application, Request, Response } from 'express';
import type { RateLimiter } from '../../middleware/rate-limiter.js';
import type { ErrorHandler } from '../../monitoring/error-handler.js';
import type { HealthMonitor } from '../../monitoring/health-monitor.js';
import type { StoreGateway } from '../../store/store-gateway.js';
import { createHealthRoutes } from './health.js';
import { createMessageRoutes } from './messages.js';
import { createResourceRoutes } from './resources.js';

export interface RouteDependencies {
  gateway: StoreGateway;
  healthMonitor: HealthMonitor;
  errorHandler: ErrorHandler;
  writeLimiter?: RateLimiter;
}

/**
 * Setup all API routes for the HTTP service
 * @param app - Express application instance
 * @param urlPrefix - URL prefix for resource routes
 */
export function setupRoutes(app: Application, urlPrefix: string, deps: RouteDependencies): void {
  console.log('Setting up docrelay API routes...');

  // Health check routes (unprefixed, for orchestrators)
  app.use('/health', createHealthRoutes(deps.healthMonitor, 'docrelay-http'));

  app.get('/errors', (req: Request, res: Response) => {
    res.json({
      success: true,
      data: deps.errorHandler.getErrorStats(),
      timestamp: new Date().toISOString(),
    });
  });

  // Resource routes
  const writeLimit = deps.writeLimiter?.middleware();
  app.use(`${urlPrefix}/resources`, createResourceRoutes(deps.gateway, writeLimit));

  // Form submissions from the index page
  app.use('/message', createMessageRoutes(deps.gateway, { resourcesPath: `${urlPrefix}/resources`, writeLimiter: writeLimit }));

  // Root endpoint
  app.get(urlPrefix, (req: Request, res: Response) => {
    res.json({
      service: 'docrelay',
      version: '1.0.0',
      status: 'running',
      description: 'Document writes with real-time change delivery',
      endpoints: {
        health: '/health',
        errors: '/errors',
        resources: `${urlPrefix}/resources/:resourceId`,
        messages: 'POST /message',
      },
      timestamp: new Date().toISOString(),
    });
  });

  // 404 handler for undefined routes
  app.use(`${urlPrefix}/*`, (req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'NOT_FOUND',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      timestamp: new Date().toISOString(),
    });
  });

  console.log('All API routes configured successfully');
}
