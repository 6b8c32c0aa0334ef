import express from 'express';
import { DocumentStore } from '../connections/db/document-store';
import { appConfig } from '../connections/config/app.config';
import { createProductsRouter } from '../modules/products/products.routes';
import { createOrdersRouter } from '../modules/orders/orders.routes';
import { createPagesRouter } from '../modules/pages/pages.routes';

export const createApiRouter = (store: DocumentStore) => {
  const router = express.Router();

  router.get('/hello', (req, res) => {
    res.json({ message: `Welcome to ${appConfig.storeName} API` });
  });

  // API Routes
  router.use('/products', createProductsRouter(store));
  router.use('/orders', createOrdersRouter(store));
  router.use('/pages', createPagesRouter(store));

  return router;
};
