import express from 'express';
import { DocumentStore } from '../../connections/db/document-store';
import { createPagesController } from './pages.controller';
import { PagesService } from './pages.service';

export const createPagesRouter = (store: DocumentStore) => {
  const router = express.Router();
  const pagesController = createPagesController(new PagesService(store));

  router.get('/:key', pagesController.getPageByKey);

  return router;
};
