import type { Request, Response } from 'express';
import { getBearerToken, headersOf } from '../middleware/accessControl';
import type { AuthenticatedDriver } from '../services/AuthSessionService';
import type { LeaderboardConfigService } from '../services/LeaderboardConfigService';
import type { LapTimeService } from '../services/LapTimeService';
import type { BlacklistService } from '../services/BlacklistService';
import type { AuthSessionService } from '../services/AuthSessionService';
import { config } from '../config';

export interface AdminServices {
  leaderboardConfigService: LeaderboardConfigService;
  lapTimeService: LapTimeService;
  blacklistService: BlacklistService;
  authSessionService: AuthSessionService;
}

export type Context = {
  req?: Request;
  res?: Response;
  services: AdminServices;
  driver: AuthenticatedDriver | null;
  isAdmin: boolean;
};

export const createContext = ({
  req,
  res,
  services,
  getAdminDriverIds = () => config.adminDriverIds,
}: {
  req?: Request;
  res?: Response;
  services: AdminServices;
  getAdminDriverIds?: () => string[]; // Override for testing
}): Context => {
  const token = req ? getBearerToken(headersOf(req)) : null;
  const driver = token ? services.authSessionService.getByToken(token) : null;
  return {
    req,
    res,
    services,
    driver,
    isAdmin: driver !== null && getAdminDriverIds().includes(driver.driverId),
  };
};
