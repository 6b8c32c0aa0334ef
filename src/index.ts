import { Server } from 'http';
import { Connection } from 'mongoose';
import { createApp } from './app';
import { appConfig, dbConfig } from './connections/config/app.config';
import { connectDatabase, disconnectDatabase, MongoDocumentStore } from './connections';
import { logger } from './utils/logging';
import { errorMessage } from './utils/errors';

const PORT = appConfig.port;

const closeServer = (server: Server) =>
  new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });

const registerShutdown = (server: Server, connection: Connection | null) => {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received, shutting down...`);

    try {
      await closeServer(server);
      if (connection) {
        await disconnectDatabase(connection);
      }
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', { error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
};

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  try {
    let connection: Connection | null = null;

    if (dbConfig.url && dbConfig.name) {
      logger.info('Connecting to database...');
      connection = await connectDatabase(dbConfig);
    } else {
      logger.warn('DATABASE_URL or DATABASE_NAME not set, starting without a database');
    }

    const app = createApp(new MongoDocumentStore(connection), dbConfig);

    const server = app.listen(PORT, () => {
      logger.info(`Server is running on port ${PORT}`);
      logger.info(`Environment: ${appConfig.nodeEnv}`);
    });

    registerShutdown(server, connection);
  } catch (error) {
    logger.error('Failed to start server', {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    logger.error('Exiting application...');
    process.exit(1);
  }
};

void startServer();
