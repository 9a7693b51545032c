/**
 * app.ts
 *
 * Express application factory. Services and the rate limiter are passed in,
 * so the server and each test build their own instance.
 */

import express, { type Express } from 'express';
import cors from 'cors';
import * as trpcExpress from '@trpc/server/adapters/express';
import { appRouter } from './routers';
import { createContext } from './trpc/context';
import { createAuthMiddleware, createRateLimitMiddleware } from './middleware/accessControl';
import { errorHandler } from './middleware/errorHandler';
import leaderboardRouter from './routes/leaderboard';
import userRouter from './routes/user';
import discordRouter from './routes/discord';
import publicRouter from './routes/public';
import type { RateLimiter } from './services/RateLimiter';
import type { LeaderboardConfigService } from './services/LeaderboardConfigService';
import type { LapTimeService } from './services/LapTimeService';
import type { BlacklistService } from './services/BlacklistService';
import type { AuthSessionService } from './services/AuthSessionService';
import type { LoginService } from './services/LoginService';
import type { CarModelService } from './services/CarModelService';

export interface AppServices {
  leaderboardConfigService: LeaderboardConfigService;
  lapTimeService: LapTimeService;
  blacklistService: BlacklistService;
  authSessionService: AuthSessionService;
  loginService: LoginService;
  carModelService: CarModelService;
}

export interface AppDependencies {
  services: AppServices;
  rateLimiter: RateLimiter;
  getVersion: () => string;
  getAdminDriverIds?: () => string[];
}

export function createApp({ services, rateLimiter, getVersion, getAdminDriverIds }: AppDependencies): Express {
  const app = express();

  // Behind a reverse proxy in production
  app.set('trust proxy', 1);
  app.use(cors());

  // Order matters: rate limiting runs before auth
  app.use(createRateLimitMiddleware(rateLimiter));
  app.use(createAuthMiddleware(services.authSessionService));

  app.use(
    '/trpc',
    express.json(),
    trpcExpress.createExpressMiddleware({
      router: appRouter,
      createContext: ({ req, res }) => createContext({ req, res, services, getAdminDriverIds }),
    })
  );

  // ===== ROUTE REGISTRATION =====
  app.use('/leaderboard', leaderboardRouter(services));
  app.use('/user', userRouter(services));
  app.use('/discord', discordRouter(services));
  app.use(publicRouter({ carModelService: services.carModelService, getVersion }));
  // ===== END ROUTE REGISTRATION =====

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use(errorHandler);

  return app;
}
