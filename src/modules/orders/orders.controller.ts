import { Request, Response, NextFunction } from 'express';
import { ResponseHandler } from '../../utils/response';
import { BadRequestError, NotFoundError, asServerError, errorMessage } from '../../utils/errors';
import { orderSchema } from './orders.validation';
import { OrdersService } from './orders.service';

export const createOrdersController = (ordersService: OrdersService) => {
  // Checkout
  const createOrder = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validated = orderSchema.parse(req.body);
      const order = await ordersService.createOrder(validated);
      return ResponseHandler.success(res, order);
    } catch (error) {
      return next(asServerError(error));
    }
  };

  // Order lookup: a malformed id or a failing store is reported as a bad request
  const getOrderById = async (req: Request<{ id: string }>, res: Response, next: NextFunction) => {
    try {
      const order = await ordersService.getOrderById(req.params.id);
      return ResponseHandler.success(res, order);
    } catch (error) {
      if (error instanceof NotFoundError || error instanceof BadRequestError) {
        return next(error);
      }
      return next(new BadRequestError(errorMessage(error)));
    }
  };

  return { createOrder, getOrderById };
};
