import type { AppConfig } from './src/config/index.js';
import type { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';
import { createChangeFeed } from './src/services/change-feeds.js';
import { ChangeNotifier } from './src/services/change-notifier.js';
import { SessionManager } from './src/socket/session-manager.js';
import { SocketServer } from './src/socket/socket-server.js';
import { createStoreGateway } from './src/store/index.js';
import type { StoreGateway } from './src/store/store-gateway.js';

export interface SocketServiceDependencies {
  /** A gateway owned by the caller; it is neither connected nor closed here. */
  gateway?: StoreGateway;
  shutdown?: GracefulShutdown;
}

export interface SocketService {
  server: SocketServer;
  port: number;
  notifier: ChangeNotifier;
  sessions: SessionManager;
  gateway: StoreGateway;
  stop(): Promise<void>;
}

/**
 * Start the socket service: observes the store and pushes changes to subscribed sessions.
 */
export async function startSocketService(config: AppConfig, deps: SocketServiceDependencies = {}): Promise<SocketService> {
  console.log('🚀 Starting docrelay socket service...');
  console.log(`Port: ${config.socketPort}`);
  console.log(`Path: ${config.socketPath}`);
  console.log(`Change feed: ${config.notifier.feed}`);

  const ownsGateway = deps.gateway === undefined;
  const gateway = deps.gateway ?? createStoreGateway(config.store);
  if (ownsGateway) {
    console.log('📊 Connecting to document store...');
    await gateway.connect();
    console.log(`✅ Store ready: ${gateway.storeName}`);
  }

  const notifier = new ChangeNotifier({
    bufferSize: config.notifier.subscriberBufferSize,
    reorderWindowMs: config.notifier.reorderWindowMs,
  });
  await notifier.attach(
    createChangeFeed(config.notifier.feed, gateway, {
      pollIntervalMs: config.notifier.pollIntervalMs,
      gapTimeoutMs: config.notifier.gapTimeoutMs,
    })
  );

  const sessions = new SessionManager({ notifier, gateway }, config.session);
  sessions.start();

  const server = new SocketServer(sessions, notifier, { path: config.socketPath });
  const port = await server.listen(config.socketPort);

  console.log('🌐 docrelay socket service running on port', port);
  console.log(`📡 WebSocket endpoint: ws://localhost:${port}${config.socketPath}`);
  console.log(`🔍 Health check available at: http://localhost:${port}/health`);

  let stopped = false;
  const stop = async (): Promise<void> => {
    if (stopped) return;
    stopped = true;
    console.log('🛑 Closing socket server...');
    await server.close();
    await notifier.close();
    if (ownsGateway) {
      await gateway.close();
    }
    console.log('✅ Socket server closed');
  };

  deps.shutdown?.addCleanupTask('socket service', stop);

  return { server, port, notifier, sessions, gateway, stop };
}
