import { Request, Response } from 'express';
import { ResponseHandler } from '../../utils/response';
import { HealthService } from './health.service';

export const createHealthController = (healthService: HealthService) => {
  const getDiagnostics = async (req: Request, res: Response) => {
    const diagnostics = await healthService.getDiagnostics();
    return ResponseHandler.success(res, diagnostics);
  };

  return { getDiagnostics };
};
