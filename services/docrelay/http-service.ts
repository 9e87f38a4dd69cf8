import type { Server } from 'node:http';
import type { Express } from 'express';
import { createHttpApp } from './src/api/http-app.js';
import type { AppConfig } from './src/config/index.js';
import { RateLimitPresets } from './src/middleware/rate-limiter.js';
import { ErrorHandler } from './src/monitoring/error-handler.js';
import type { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';
import { HealthMonitor } from './src/monitoring/health-monitor.js';
import { createStoreGateway } from './src/store/index.js';
import type { StoreGateway } from './src/store/store-gateway.js';

export interface HttpServiceDependencies {
  /** A gateway owned by the caller; it is neither connected nor closed here. */
  gateway?: StoreGateway;
  shutdown?: GracefulShutdown;
}

export interface HttpService {
  app: Express;
  server: Server;
  port: number;
  gateway: StoreGateway;
  errorHandler: ErrorHandler;
  stop(): Promise<void>;
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

function listen(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

/**
 * Start the HTTP service: the write path into the store.
 */
export async function startHttpService(config: AppConfig, deps: HttpServiceDependencies = {}): Promise<HttpService> {
  console.log('🚀 Starting docrelay HTTP service...');
  console.log(`Environment: ${config.nodeEnv}`);
  console.log(`Port: ${config.httpPort}`);
  console.log(`URL Prefix: ${config.urlPrefix}`);

  const ownsGateway = deps.gateway === undefined;
  const gateway = deps.gateway ?? createStoreGateway(config.store);
  if (ownsGateway) {
    console.log('📊 Connecting to document store...');
    await gateway.connect();
    console.log(`✅ Store ready: ${gateway.storeName}`);
  }

  const healthMonitor = new HealthMonitor({ gateway });
  const errorHandler = new ErrorHandler({ exposeDetails: config.nodeEnv === 'development' });
  const globalLimiter = RateLimitPresets.global();
  const writeLimiter = RateLimitPresets.resourceWrites();

  const app = createHttpApp({
    gateway,
    healthMonitor,
    errorHandler,
    urlPrefix: config.urlPrefix,
    globalLimiter,
    writeLimiter,
    publicDir: config.publicDir,
  });

  const server = await listen(app, config.httpPort);
  const address = server.address();
  const port = address !== null && typeof address === 'object' ? address.port : config.httpPort;

  console.log('🌐 docrelay HTTP service running on port', port);
  console.log(`📡 Resource API available at: http://localhost:${port}${config.urlPrefix}/resources/:resourceId`);
  console.log(`🔍 Health check available at: http://localhost:${port}/health`);

  let stopped = false;
  const stop = async (): Promise<void> => {
    if (stopped) return;
    stopped = true;
    console.log('🛑 Closing HTTP server...');
    await closeServer(server);
    globalLimiter.stop();
    writeLimiter.stop();
    if (ownsGateway) {
      await gateway.close();
    }
    console.log('✅ HTTP server closed');
  };

  deps.shutdown?.addCleanupTask('http service', stop);

  return { app, server, port, gateway, errorHandler, stop };
}
