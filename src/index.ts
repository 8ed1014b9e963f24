// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT — Veracity Claim Verification Service
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig } from './config/index.js';
import { createContainer } from './container.js';
import { createServerCloseHook, ShutdownCoordinator } from './infrastructure/shutdown/index.js';
import { configureLogger, getLogger } from './logging/index.js';
import { createApp } from './server.js';

const logger = getLogger({ component: 'main' });

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
    redactSecrets: config.logging.redactSecrets,
    environment: config.environment,
  });

  const container = createContainer(config);

  // Warm the stance backends before taking traffic.
  await container.classifier.initialize();
  if (!container.classifier.isReady()) {
    logger.warn('No stance backend loaded; every source will be scored NEUTRAL');
  }

  const app = createApp(container);
  const server = app.listen(config.server.port, config.server.host, () => {
    logger.info('Server listening', {
      host: config.server.host,
      port: config.server.port,
      environment: config.environment,
      backends: container.classifier.availableBackends,
    });
  });

  const shutdown = new ShutdownCoordinator();
  shutdown.register('http-server', createServerCloseHook(server), { priority: 'critical' });
  shutdown.register('store', () => container.store.disconnect(), { priority: 'high' });
  shutdown.installSignalHandlers();
}

main().catch((error: unknown) => {
  logger.fatal('Failed to start', error);
  process.exit(1);
});
