import { createApp, createServices } from './app';
import { env } from './config/environment';
import { logger } from './config/logger';
import { closeConnection, getReservationStore, testConnection } from './config/database';

/**
 * Application Entry Point
 *
 * Starts the Express server and handles graceful shutdown
 */

async function startServer(): Promise<void> {
  // Verify the store before accepting traffic
  if (!(await testConnection())) {
    throw new Error(`Reservation store (${env.STORE_DRIVER}) is not reachable`);
  }

  const app = createApp(createServices(getReservationStore()));

  const server = app.listen(env.PORT, () => {
    logger.info(`
╔════════════════════════════════════════════════════════════╗
║  Venue Reservation API Server                              ║
╟────────────────────────────────────────────────────────────╢
║  Environment: ${env.NODE_ENV.padEnd(44)} ║
║  Store:       ${env.STORE_DRIVER.padEnd(44)} ║
║  Base URL:    http://localhost:${String(env.PORT).padEnd(27)} ║
║  Docs:        http://localhost:${`${env.PORT}/docs`.padEnd(27)} ║
║  Health:      http://localhost:${`${env.PORT}/health`.padEnd(27)} ║
╚════════════════════════════════════════════════════════════╝
    `.trim());

    logger.info('Server is ready to accept connections');
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
  logger.error('Failed to start server', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
