import { createApp } from './app';
import { env } from './config/environment';
import { logger } from './config/logger';
import { closeConnection, testConnection } from './config/database';

/**
 * Application Entry Point
 *
 * Starts the Express server and handles graceful shutdown
 */

// Verify the listings table is reachable before accepting requests
async function verifyDatabaseConnection(): Promise<void> {
  if (env.STORE_DRIVER !== 'supabase') {
    logger.warn('Using the in-memory listing store; data is lost on restart');
    return;
  }

  const connected = await testConnection();
  if (!connected) {
    throw new Error(`Listings table "${env.SUPABASE_LISTINGS_TABLE}" is not reachable`);
  }
}

// Start server
async function startServer(): Promise<void> {
  await verifyDatabaseConnection();

  const app = createApp();

  const server = app.listen(env.PORT, () => {
    logger.info('Donation Claims API listening', {
      environment: env.NODE_ENV,
      store: env.STORE_DRIVER,
      baseUrl: `http://localhost:${env.PORT}`,
      docs: `http://localhost:${env.PORT}/docs`,
      health: `http://localhost:${env.PORT}/health`,
    });
  });

  // Graceful shutdown handler
  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received, starting graceful shutdown...`);

    server.close(() => {
      logger.info('HTTP server closed');
      closeConnection();
      process.exit(0);
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection', { reason });
    gracefulShutdown('unhandledRejection');
  });
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', { error });
  process.exit(1);
});
