import express from 'express';
import cors from 'cors';
import { DocumentStore } from './connections/db/document-store';
import { DatabaseConfig, appConfig, dbConfig } from './connections/config/app.config';
import { createApiRouter } from './routes';
import { createHealthRouter } from './modules/health/health.routes';
import { requestLogger } from './middlewares/request-logger.middleware';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';

/**
 * Build the Express application around an already created store
 */
export const createApp = (store: DocumentStore, databaseConfig: Pick<DatabaseConfig, 'url' | 'name'> = dbConfig) => {
  const app = express();

  // CORS: every origin, method and header is allowed; the request origin is reflected
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json());
  app.use(requestLogger);

  // Liveness
  app.get('/', (req, res) => {
    res.json({ message: `${appConfig.storeName} Backend Running` });
  });

  // Store diagnostics
  app.use('/test', createHealthRouter(store, databaseConfig));

  // API Routes
  app.use('/api', createApiRouter(store));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
