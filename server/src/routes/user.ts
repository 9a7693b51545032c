/**
 * routes/user.ts
 *
 * Routes for the authenticated driver (bearer auth, route table)
 */

import { Router, Request, Response } from 'express';
import { getDriver } from '../middleware/accessControl';
import type { AuthSessionService } from '../services/AuthSessionService';

interface UserServices {
  authSessionService: AuthSessionService;
}

export default (services: UserServices): Router => {
  const { authSessionService } = services;
  const router = Router();

  /**
   * GET /user
   * Name of the driver owning the token
   */
  router.get('/', (req: Request, res: Response): void => {
    res.json({ name: getDriver(req).driverName });
  });

  /**
   * POST /user/logout
   * Invalidate the presented token
   */
  router.post('/logout', (req: Request, res: Response): void => {
    const driver = getDriver(req);
    try {
      if (req.authToken) {
        authSessionService.destroy(req.authToken);
      }
    } catch (error) {
      console.error('[USER] Error logging out:', error);
      res.status(500).json({ error: 'Internal server error' });
      return;
    }

    console.log(`[USER] '${driver.driverName}' logged out`);
    res.json({ message: 'Logged out successfully' });
  });

  return router;
};
