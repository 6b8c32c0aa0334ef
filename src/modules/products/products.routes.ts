import express from 'express';
import { DocumentStore } from '../../connections/db/document-store';
import { createProductsController } from './products.controller';
import { ProductsService } from './products.service';

export const createProductsRouter = (store: DocumentStore) => {
  const router = express.Router();
  const productsController = createProductsController(new ProductsService(store));

  // Public catalog
  router.get('/', productsController.getProducts);

  return router;
};
