#!/usr/bin/env node
/**
 * Process entry point: load configuration, start the application, shut it
 * down on SIGTERM/SIGINT within a grace period.
 */

import { SyncApplication, createLogger } from './app/sync-application.js';
import { loadConfig } from './config/loader.js';
import type { LoadedConfig } from './config/loader.js';
import { ConfigurationError } from './errors/hierarchy.js';

const SHUTDOWN_GRACE_MS = 30_000;

function loadOrExit(): LoadedConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const { config, warnings } = loadOrExit();
  const logger = createLogger(config);
  for (const warning of warnings) {
    logger.warn('Configuration warning', { warning });
  }

  const app = new SyncApplication(config, { logger });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutdown signal received', { signal });

    const timer = setTimeout(() => {
      logger.error('Graceful shutdown timed out, exiting');
      process.exit(1);
    }, SHUTDOWN_GRACE_MS);
    timer.unref();

    app
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown error', error);
        process.exit(1);
      });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);

  await app.start();
}

main().catch((error: unknown) => {
  console.error('Failed to initialize application:', error);
  process.exit(1);
});
