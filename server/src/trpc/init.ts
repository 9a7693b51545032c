import { initTRPC, TRPCError } from '@trpc/server';
import { Context } from './context';
import { ZodError } from 'zod';

const t = initTRPC.context<Context>().create({
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        zodError:
          error.cause instanceof ZodError ? error.cause.flatten() : null,
      },
    };
  },
});

export const router = t.router;
export const middleware = t.middleware;
export const publicProcedure = t.procedure;

const isAdmin = middleware(async ({ ctx, next }) => {
  if (!ctx.driver) {
    throw new TRPCError({ code: 'UNAUTHORIZED' });
  }
  if (!ctx.isAdmin) {
    console.warn(`[ADMIN] Non-admin access attempt by driver ${ctx.driver.driverId}`);
    throw new TRPCError({ code: 'FORBIDDEN' });
  }
  return next({
    ctx: {
      // infers the `driver` as non-nullable
      driver: ctx.driver,
    },
  });
});

export const adminProcedure = publicProcedure.use(isAdmin);
