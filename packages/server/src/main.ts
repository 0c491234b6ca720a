#!/usr/bin/env node

/**
 * Account link service entry point
 */

import { EnvironmentConfig } from '@account-link/config';
import { logger, initializeMetrics } from '@account-link/observability';
import { setLogger as setPersistenceLogger } from '@account-link/persistence';
import { createLinkApplication } from './application.js';

async function main() {
  try {
    EnvironmentConfig.setLogger(logger);
    setPersistenceLogger(logger);

    const config = EnvironmentConfig.get();
    logger.info('Starting account link service', { environment: config.NODE_ENV });

    EnvironmentConfig.logConfiguration();
    initializeMetrics();

    const { httpServer } = createLinkApplication();
    await httpServer.start();

    const handleShutdown = async (signal: string) => {
      logger.info(`Received ${signal}, shutting down gracefully`);
      try {
        await httpServer.stop();
        logger.info('Server stopped successfully');
        process.exit(0);
      } catch (error) {
        logger.error('Error during shutdown', error);
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void handleShutdown('SIGINT'));
    process.on('SIGTERM', () => void handleShutdown('SIGTERM'));

  } catch (error) {
    logger.error('Server startup failed', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled server error', error);
  process.exit(1);
});
