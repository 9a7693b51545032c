/**
 * routes/public.ts
 *
 * Public routes (no auth, no rate limit)
 * - Health check endpoint
 * - Version the recorder must match
 * - Car signature table
 */

import { Router, Request, Response } from 'express';
import type { CarModelService } from '../services/CarModelService';

interface PublicServices {
  carModelService: CarModelService;
  getVersion: () => string;
}

export default (services: PublicServices): Router => {
  const { carModelService, getVersion } = services;
  const router = Router();

  /**
   * GET /health
   * Health check endpoint
   */
  router.get('/health', (_req: Request, res: Response): void => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  router.get('/version', (_req: Request, res: Response): void => {
    res.json({ version: getVersion() });
  });

  router.get('/cars', (_req: Request, res: Response): void => {
    res.json(carModelService.getAll());
  });

  return router;
};
