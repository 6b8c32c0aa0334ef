import express from 'express';
import { DocumentStore } from '../../connections/db/document-store';
import { DatabaseConfig } from '../../connections/config/app.config';
import { createHealthController } from './health.controller';
import { HealthService } from './health.service';

export const createHealthRouter = (store: DocumentStore, config: Pick<DatabaseConfig, 'url' | 'name'>) => {
  const router = express.Router();
  const healthController = createHealthController(new HealthService(store, config));

  router.get('/', healthController.getDiagnostics);

  return router;
};
