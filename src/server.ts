import dotenv from 'dotenv';
import { createApp, createServices } from './app';
import { ConfigError, LoadConfigResult, loadConfig } from './config/config';
import { configureLogger, logger } from './utils/logger';

dotenv.config();

function loadConfigOrExit(): LoadConfigResult {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(`Configuration error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Start the server
 */
async function startServer(): Promise<void> {
  const { config, warnings } = loadConfigOrExit();
  configureLogger(config.logging);
  for (const warning of warnings) {
    logger.warn(warning);
  }

  const services = createServices(config);
  await services.store.initialize();
  logger.info(`User storage ready at ${services.store.getRoot()}`);

  const app = createApp(services);

  const server = app.listen(config.port, () => {
    logger.info('Server started successfully', {
      port: config.port,
      environment: config.nodeEnv,
      health: `http://localhost:${config.port}/health`,
    });
  });

  // Graceful shutdown handlers
  const gracefulShutdown = (signal: string): void => {
    logger.info(`${signal} received, starting graceful shutdown`);

    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception:', { message: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection:', { reason: reason instanceof Error ? reason.message : String(reason) });
    gracefulShutdown('unhandledRejection');
  });
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server:', {
    error: error instanceof Error ? error.message : 'Unknown error',
  });
  process.exit(1);
});
