import 'dotenv/config';
import http from 'http';
import app from './app.js';
import { logger } from './config/logger.js';
import { API_VERSION, APP_VERSION, ServerConfig } from './config/constants.js';
import { seedSampleMenu } from './modules/menu/menu.seed.js';

const { PORT, HOST } = ServerConfig;

// Create HTTP server
const server = http.createServer(app);

let shuttingDown = false;

// Graceful shutdown handler
const gracefulShutdown = (signal: string, exitCode = 0): void => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`${signal} received. Starting graceful shutdown...`);

  // Stop accepting new connections
  server.close((error) => {
    if (error) {
      logger.error('Error during graceful shutdown:', { error: error.message });
      process.exit(1);
    }
    logger.info('HTTP server closed');
    process.exit(exitCode);
  });

  // Force shutdown after the timeout
  setTimeout(() => {
    logger.error('Forced shutdown due to timeout');
    process.exit(1);
  }, ServerConfig.SHUTDOWN_TIMEOUT_MS).unref();
};

// Register shutdown handlers
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception:', { error: error.message, stack: error.stack });
  gracefulShutdown('uncaughtException', 1);
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection:', { reason });
  gracefulShutdown('unhandledRejection', 1);
});

// Start server
const startServer = async (): Promise<void> => {
  try {
    if (ServerConfig.SEED_SAMPLE_MENU) {
      await seedSampleMenu();
    }

    server.listen(PORT, HOST, () => {
      logger.info('='.repeat(60));
      logger.info('Restaurant Order Service Started');
      logger.info('='.repeat(60));
      logger.info(`Version: ${APP_VERSION}`);
      logger.info(`Host: ${HOST}`);
      logger.info(`Port: ${PORT}`);
      logger.info(`Environment: ${process.env['NODE_ENV'] ?? 'development'}`);
      logger.info(`Node: ${process.version}`);
      logger.info('-'.repeat(60));
      logger.info(`Health: http://${HOST}:${PORT}/health`);
      logger.info(`API: http://${HOST}:${PORT}${API_VERSION}`);
      logger.info(`Docs: http://${HOST}:${PORT}/swagger`);
      logger.info('='.repeat(60));
    });
  } catch (error) {
    logger.error('Failed to start server:', { error: error instanceof Error ? error.message : error });
    process.exit(1);
  }
};

// Start the server
void startServer();
