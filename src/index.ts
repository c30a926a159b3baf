import { buildServer } from './api/server.js';
import { BackendSelector } from './core/backend-selector.js';
import { loadConfig } from './utils/config.js';
import { createLogger } from './utils/logger.js';

async function main() {
  // Load configuration
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  // Connect the configured backend; a failure here is fatal
  const selector = new BackendSelector(config.storage, { logger });
  const store = await selector.select();

  const app = await buildServer(store, logger);

  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });
    logger.info(
      { port: config.server.port, host: config.server.host, backend: store.backend },
      'Server started successfully'
    );
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    await selector.close();
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down...');
    try {
      await app.close();
      await selector.close();
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', (signal) => void shutdown(signal));
  process.on('SIGTERM', (signal) => void shutdown(signal));
}

main().catch((error: unknown) => {
  // Configuration may have failed, so log at the default level.
  createLogger().fatal({ err: error }, 'Fatal error');
  process.exit(1);
});
