import express from 'express';
import { DocumentStore } from '../../connections/db/document-store';
import { createOrdersController } from './orders.controller';
import { OrdersService } from './orders.service';

export const createOrdersRouter = (store: DocumentStore) => {
  const router = express.Router();
  const ordersController = createOrdersController(new OrdersService(store));

  router.post('/', ordersController.createOrder);
  router.get('/:id', ordersController.getOrderById);

  return router;
};
