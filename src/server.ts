// src/server.ts
import { validateConfig } from './utils/config.js';
import { logger } from './utils/logger.js';
import { DatabaseManager } from './data/database/postgres.js';
import { buildApp } from './app.js';

const start = async (): Promise<void> => {
  // Missing credentials or an unreachable database stop the process here
  const appConfig = validateConfig();
  const database = new DatabaseManager(appConfig.database);
  await database.connect();

  const fastify = await buildApp({ database, config: appConfig });

  // Graceful shutdown
  const gracefulShutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    try {
      await fastify.close();
      await database.disconnect();
      logger.info('✅ Server shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  const address = await fastify.listen({
    port: appConfig.port,
    host: appConfig.host
  });

  logger.info(`🚀 Task service is running!`);
  logger.info(`📡 Server listening on ${address}`);
  logger.info(`🌍 Environment: ${appConfig.node_env}`);
  logger.info(`💊 Health check: http://localhost:${appConfig.port}/health`);
};

start().catch((error: unknown) => {
  logger.error('Error starting server:', error);
  process.exit(1);
});
