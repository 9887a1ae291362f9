import { createApp } from './app';
import { createContainer } from './config/container';
import { env } from './config/environment';
import { logger } from './config/logger';
import { closeConnection, testConnection } from './config/database';

/**
 * Application Entry Point
 *
 * Builds the service container, starts the Express server and handles graceful shutdown
 */
async function startServer(): Promise<void> {
  if (env.STORAGE_DRIVER === 'supabase' && !(await testConnection())) {
    throw new Error('Database connection failed');
  }

  const container = await createContainer();
  const app = createApp(container);

  const server = app.listen(env.PORT, () => {
    logger.info(
      `
╔════════════════════════════════════════════════════════════╗
║  POS Ledger API Server                                     ║
╟────────────────────────────────────────────────────────────╢
║  Environment: ${env.NODE_ENV.padEnd(44)} ║
║  Storage:     ${env.STORAGE_DRIVER.padEnd(44)} ║
║  Base URL:    ${`http://localhost:${env.PORT}`.padEnd(44)} ║
║  Docs:        ${`http://localhost:${env.PORT}/docs`.padEnd(44)} ║
║  Health:      ${`http://localhost:${env.PORT}/health`.padEnd(44)} ║
╚════════════════════════════════════════════════════════════╝
      `.trim()
    );

    logger.info('Server is ready to accept connections');
  });

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
