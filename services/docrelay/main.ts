import { loadEnvConfig, parseServiceMode } from './src/config/index.js';
import { isDocRelayError } from './src/core/errors.js';
import { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';
import { createStoreGateway } from './src/store/index.js';
import { startHttpService } from './http-service.js';
import { startSocketService } from './socket-service.js';

async function startService(): Promise<void> {
  const config = loadEnvConfig();
  const mode = parseServiceMode(process.argv.slice(2));
  console.log(`🚀 Starting docrelay (${mode})...`);

  const shutdown = new GracefulShutdown({
    timeout: config.shutdown.timeout,
    forceExit: config.shutdown.forceExit,
  });

  if (mode === 'http') {
    await startHttpService(config, { shutdown });
  } else if (mode === 'socket') {
    await startSocketService(config, { shutdown });
  } else {
    const gateway = createStoreGateway(config.store);
    await gateway.connect();
    // Cleanup runs in registration order: servers first, then the shared store.
    await startHttpService(config, { gateway, shutdown });
    await startSocketService(config, { gateway, shutdown });
    shutdown.addCleanupTask('document store', () => gateway.close());
  }

  console.log('🎉 docrelay started successfully!');
}

startService().catch((error: unknown) => {
  if (isDocRelayError(error)) {
    console.error(`💥 Failed to start service: [${error.code}] ${error.message}`);
  } else {
    console.error('💥 Failed to start service:', error);
  }
  process.exit(1);
});
