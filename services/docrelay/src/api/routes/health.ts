import { Router, type Request, type Response } from 'express';
import type { HealthMonitor } from '../../monitoring/health-monitor.js';

/**
 * Create health check routes
 * @param healthMonitor - Health monitor for the store and delivery path
 * @returns Express router with health endpoints
 */
export function createHealthRoutes(healthMonitor: HealthMonitor, serviceName: string): Router {
  const router = Router();

  /**
   * Health check with store, feed and session detail
   */
  router.get('/', async (req: Request, res: Response): Promise<void> => {
    try {
      const metrics = await healthMonitor.getHealthMetrics();

      res.status(metrics.status === 'unhealthy' ? 503 : 200).json({
        service: serviceName,
        version: '1.0.0',
        ...metrics,
      });
    } catch (error) {
      res.status(500).json({
        status: 'unhealthy',
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      });
    }
  });

  /**
   * Readiness check endpoint
   */
  router.get('/ready', async (req: Request, res: Response): Promise<void> => {
    const ready = await healthMonitor.isReady().catch(() => false);

    if (ready) {
      res.json({
        status: 'ready',
        message: 'Service is ready to accept requests',
        timestamp: new Date().toISOString(),
      });
    } else {
      res.status(503).json({
        status: 'not_ready',
        message: 'Store is unreachable',
        timestamp: new Date().toISOString(),
      });
    }
  });

  /**
   * Liveness check endpoint
   */
  router.get('/live', (req: Request, res: Response): void => {
    res.json({
      status: 'alive',
      message: 'Service is alive',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  return router;
}
