import { router, publicProcedure } from '../trpc/init';
import { leaderboardRouter } from './leaderboard';
import { blacklistRouter } from './blacklist';

export const appRouter = router({
  health: publicProcedure.query(() => 'ok'),
  leaderboard: leaderboardRouter,
  blacklist: blacklistRouter,
});

export type AppRouter = typeof appRouter;
