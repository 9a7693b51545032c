import { z } from 'zod';
import { router, publicProcedure, adminProcedure } from '../trpc/init';
import { TRPCError } from '@trpc/server';
import { toLeaderboardResponse } from '../services/LeaderboardConfigService';
import { isCarClassCode, isGripLevelCode, isWeatherConditionCode } from '../../../shared/racing';

const trackInput = z.object({ track: z.string().trim().min(1) });

const upsertInput = z.object({
  track: z.string().trim().min(1).max(100),
  discordChannel: z.string().min(1),
  weather: z.object({
    condition: z.number().int().refine(isWeatherConditionCode, { message: 'Unknown weather condition' }),
    temperature: z.number(),
    rain: z.number().min(0).max(100),
    gripLevel: z.number().int().refine(isGripLevelCode, { message: 'Unknown grip level' }).nullable(),
  }),
  allowedClasses: z.array(z.number().int().refine(isCarClassCode, { message: 'Unknown car class' })).min(1),
  showTechnical: z.boolean().default(false),
  timeOfDay: z.number().int().min(0).max(1439).default(0),
  fixedSetupRequired: z.boolean().default(false),
});

export const leaderboardRouter = router({
  list: adminProcedure.query(({ ctx }) => {
    return ctx.services.leaderboardConfigService.list().map(toLeaderboardResponse);
  }),

  /**
   * Lap times on a track, fastest first, with sector durations
   */
  standings: publicProcedure
    .input(trackInput)
    .query(({ ctx, input }) => {
      const config = ctx.services.leaderboardConfigService.get(input.track);
      if (!config) {
        throw new TRPCError({
          code: 'NOT_FOUND',
          message: `Leaderboard for '${input.track}' not found`,
        });
      }
      return {
        leaderboard: toLeaderboardResponse(config),
        times: ctx.services.lapTimeService.getStandings(input.track, config.show_technical),
      };
    }),

  upsert: adminProcedure
    .input(upsertInput)
    .mutation(({ ctx, input }) => {
      const saved = ctx.services.leaderboardConfigService.upsert(input);
      console.log(`[ADMIN] ${ctx.driver.driverName} saved leaderboard '${input.track}'`);
      return toLeaderboardResponse(saved);
    }),

  remove: adminProcedure
    .input(trackInput)
    .mutation(({ ctx, input }) => {
      if (!ctx.services.leaderboardConfigService.remove(input.track)) {
        throw new TRPCError({
          code: 'NOT_FOUND',
          message: `Leaderboard for '${input.track}' not found`,
        });
      }
      return { removed: true };
    }),

  clearTimes: adminProcedure
    .input(trackInput)
    .mutation(({ ctx, input }) => {
      return { removed: ctx.services.lapTimeService.clearTimes(input.track) };
    }),
});
