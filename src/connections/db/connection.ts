import mongoose, { Connection } from 'mongoose';
import { DatabaseConfig, dbConfig } from '../config/app.config';
import { logger } from '../../utils/logging';
import { errorMessage } from '../../utils/errors';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const watchConnection = (connection: Connection): void => {
  connection.on('error', (err: Error) => {
    logger.error('MongoDB connection error', { error: err.message, stack: err.stack });
  });
  connection.on('disconnected', () => {
    logger.warn('MongoDB disconnected');
  });
  connection.on('reconnected', () => {
    logger.info('MongoDB reconnected');
  });
};

/**
 * Open the MongoDB connection, retrying on failure
 * @returns the live connection
 */
export const connectDatabase = async (config: DatabaseConfig = dbConfig): Promise<Connection> => {
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxRetries; attempt++) {
    const connection = mongoose.createConnection(config.url, {
      dbName: config.name,
      serverSelectionTimeoutMS: 5000,
    });

    try {
      await connection.asPromise();
      watchConnection(connection);
      logger.info('Database connected successfully', { database: config.name });
      return connection;
    } catch (err) {
      lastError = err;
      await connection.close(true).catch((closeErr: unknown) => {
        logger.debug('Failed to close rejected connection', { error: errorMessage(closeErr) });
      });

      if (attempt < config.maxRetries) {
        logger.warn(`Database connection attempt ${attempt}/${config.maxRetries} failed, retrying in ${config.retryDelay}ms...`, {
          error: errorMessage(err),
        });
        await sleep(config.retryDelay);
      } else {
        logger.error(`Database connection error after ${config.maxRetries} attempts`, {
          error: errorMessage(err),
          stack: err instanceof Error ? err.stack : undefined,
        });
      }
    }
  }

  throw lastError;
};

export const disconnectDatabase = async (connection: Connection): Promise<void> => {
  await connection.close();
  logger.info('Database connection closed');
};
