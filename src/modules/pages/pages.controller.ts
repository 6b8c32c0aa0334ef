import { Request, Response, NextFunction } from 'express';
import { ResponseHandler } from '../../utils/response';
import { asServerError } from '../../utils/errors';
import { pageKeySchema } from './pages.validation';
import { PagesService } from './pages.service';

export const createPagesController = (pagesService: PagesService) => {
  // Static page content (rules, terms, privacy...)
  const getPageByKey = async (req: Request<{ key: string }>, res: Response, next: NextFunction) => {
    try {
      const key = pageKeySchema.parse(req.params.key);
      const page = await pagesService.getPageByKey(key);
      return ResponseHandler.success(res, page);
    } catch (error) {
      return next(asServerError(error));
    }
  };

  return { getPageByKey };
};
