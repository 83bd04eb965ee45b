/**
 * @fileoverview Server entry point for the agent dispatcher.
 *
 * Validates configuration, builds the dispatcher service, mounts the
 * HTTP API and starts background pollers once the server is listening.
 */

import config, { validateConfig } from './config.js';
import { createDispatcherService } from './bootstrap.js';
import { createApp } from './app.js';
import { createLogger, initObservability } from './utils/observability/index.js';
import { withErrorContext } from './utils/errors.js';

// Fail fast if configuration is invalid
validateConfig();
initObservability();

const logger = createLogger({ domain: 'server' });

const service = createDispatcherService(config);
const app = createApp(service);

const server = app.listen(config.port, () => {
  logger.info('server_started', {
    port: config.port,
    env: config.nodeEnv,
    matcher: config.matcher.strategy,
    sessionStore: config.session.provider,
    agentCount: service.dispatcher.listAgents().length,
  });

  service.start();
});

let isShuttingDown = false;

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  logger.info('shutdown_signal_received', { signal });

  // Stop pollers first, waiting for in-flight runs, then release the store
  await withErrorContext(() => service.shutdown(), 'service_shutdown');

  const forceExitTimer = setTimeout(() => {
    logger.warn('shutdown_force_exit');
    process.exit(1);
  }, 10000);

  server.close(() => {
    clearTimeout(forceExitTimer);
    logger.info('server_closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error: unknown) => {
    logger.error('shutdown_failed', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
});
process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error: unknown) => {
    logger.error('shutdown_failed', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  });
});
