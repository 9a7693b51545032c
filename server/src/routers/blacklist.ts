import { z } from 'zod';
import { router, adminProcedure } from '../trpc/init';

const driverInput = z.object({ driverId: z.string().trim().min(1) });

export const blacklistRouter = router({
  list: adminProcedure.query(({ ctx }) => {
    return ctx.services.blacklistService.list();
  }),

  add: adminProcedure
    .input(driverInput.extend({ reason: z.string().max(200).optional() }))
    .mutation(({ ctx, input }) => {
      return { added: ctx.services.blacklistService.add(input.driverId, input.reason ?? null) };
    }),

  remove: adminProcedure
    .input(driverInput)
    .mutation(({ ctx, input }) => {
      return { removed: ctx.services.blacklistService.remove(input.driverId) };
    }),
});
