import { FastifyInstance } from 'fastify';
import { buildServer } from './app';
import { config } from './config';
import { SchemaRepositoryImpl } from './repositories';
import { DatabaseService } from './services/database.service';
import { SessionProvider } from './services/session-provider.service';
import { logger } from './utils/logger';

/**
 * Teaching data service - main server
 * Exposes CRUD over classes, courses, enrollments and venues
 */

const databaseService = new DatabaseService();
const sessionProvider = new SessionProvider(databaseService.getPool());
let fastify: FastifyInstance | undefined;

/**
 * Initialize application
 */
async function initialize(): Promise<void> {
  if (!config.DATABASE_AUTO_MIGRATE) {
    logger.info('Server', 'Schema bootstrap disabled');
    return;
  }
  // Ensure database tables exist
  await sessionProvider.withSession(session => new SchemaRepositoryImpl(session).ensureSchema());
}

/**
 * Start server
 */
async function start(): Promise<void> {
  try {
    await initialize();

    fastify = await buildServer({ databaseService, sessionProvider });

    // Start listening
    await fastify.listen({
      port: config.PORT,
      host: config.HOST,
    });
    logger.info('Server', `Listening on ${config.HOST}:${config.PORT}`);
  } catch (error) {
    logger.error('Server', 'Failed to start server', error);
    process.exit(1);
  }
}

/**
 * Graceful shutdown
 */
let isShuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.info('Server', `Shutdown already in progress, ignoring ${signal}`);
    return;
  }
  isShuttingDown = true;

  logger.info('Server', `Received ${signal}, starting graceful shutdown`);

  try {
    // Stop accepting new connections
    if (fastify) {
      await fastify.close();
      logger.info('Server', 'Fastify closed');
    }

    // Close database connection
    await databaseService.close();
    logger.info('Server', 'Database closed');

    logger.info('Server', 'Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Server', 'Error during shutdown', error);
    process.exit(1);
  }
}

// Register shutdown handlers
process.on('SIGTERM', () => { void shutdown('SIGTERM'); });
process.on('SIGINT', () => { void shutdown('SIGINT'); });

// Handle uncaught errors
process.on('uncaughtException', error => {
  logger.error('Server', 'Uncaught exception', error);
  void shutdown('uncaughtException');
});

process.on('unhandledRejection', reason => {
  logger.error('Server', 'Unhandled rejection', reason);
  void shutdown('unhandledRejection');
});

// Start the server
void start();
