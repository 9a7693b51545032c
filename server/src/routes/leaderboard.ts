/**
 * routes/leaderboard.ts
 *
 * Leaderboard routes used by the recorder
 * - Read a track's leaderboard configuration
 * - Submit a lap time (bearer auth, route table)
 */

import express, { Router, Request, Response } from 'express';
import { getDriver } from '../middleware/accessControl';
import { parseSubmissionBody } from '../validation/submission';
import { toLeaderboardResponse, type LeaderboardConfigService } from '../services/LeaderboardConfigService';
import type { LapTimeService } from '../services/LapTimeService';
import type { BlacklistService } from '../services/BlacklistService';

interface LeaderboardServices {
  leaderboardConfigService: LeaderboardConfigService;
  lapTimeService: LapTimeService;
  blacklistService: BlacklistService;
}

const SUBMIT_BODY_LIMIT = '16kb';

export default (services: LeaderboardServices): Router => {
  const { leaderboardConfigService, lapTimeService, blacklistService } = services;
  const router = Router();

  /**
   * GET /leaderboard/:track
   * Leaderboard configuration for a track
   */
  router.get('/:track', (req: Request, res: Response): void => {
    const { track } = req.params;
    try {
      const config = leaderboardConfigService.get(track);
      if (!config) {
        res.status(404).json({ error: 'Leaderboard not found' });
        return;
      }
      res.json(toLeaderboardResponse(config));
    } catch (error) {
      console.error('[LEADERBOARD] Error fetching leaderboard:', error);
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  /**
   * POST /leaderboard/:track/submit
   * Submit a lap time. The body is read as text so the blacklist check
   * runs before JSON parsing.
   */
  router.post(
    '/:track/submit',
    express.text({ type: () => true, limit: SUBMIT_BODY_LIMIT }),
    (req: Request, res: Response): void => {
      const { track } = req.params;
      const driver = getDriver(req);

      try {
        if (blacklistService.isBlacklisted(driver.driverId)) {
          console.warn(`[LEADERBOARD] Blacklisted driver ${driver.driverId} tried to submit on '${track}'`);
          res.status(403).json({ error: 'You are blacklisted' });
          return;
        }
      } catch (error) {
        console.error('[LEADERBOARD] Error checking blacklist:', error);
        res.status(500).json({ error: 'Internal server error' });
        return;
      }

      const rawBody: unknown = req.body;
      const parsed = parseSubmissionBody(typeof rawBody === 'string' ? rawBody : '');
      if (!parsed.ok) {
        res.status(400).json({ error: parsed.error });
        return;
      }
      const submission = parsed.value;

      try {
        if (!leaderboardConfigService.get(track)) {
          res.status(404).json({ error: 'Leaderboard not found' });
          return;
        }

        lapTimeService.submitLapTime(
          track,
          driver.driverId,
          submission.driverName,
          submission.car,
          submission.carClass,
          { lap: submission.lap, sector1: submission.sector1, sector2: submission.sector2 }
        );
      } catch (error) {
        console.error('[LEADERBOARD] Error submitting lap time:', error);
        res.status(500).json({ error: 'Internal server error' });
        return;
      }

      console.log(`[LEADERBOARD] Lap time submitted by '${submission.driverName}' for track '${track}'`);
      res.json({ message: 'Time submitted successfully' });
    }
  );

  return router;
};
