import { Request, Response, NextFunction } from 'express';
import { ResponseHandler } from '../../utils/response';
import { AppError, errorMessage } from '../../utils/errors';
import { ProductsService } from './products.service';

export const createProductsController = (productsService: ProductsService) => {
  // Lists the whole catalog, seeding it on first use
  const getProducts = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const products = await productsService.listProducts();
      return ResponseHandler.success(res, products);
    } catch (error) {
      return next(new AppError(errorMessage(error), 500, 'INTERNAL_ERROR'));
    }
  };

  return { getProducts };
};
