// ============================================================================
// tRPC ROUTER - Operational API
// ============================================================================

import { router, publicProcedure } from "./trpc.js";

export const appRouter = router({
  /**
   * Liveness and storage readiness
   */
  health: publicProcedure.query(async ({ ctx }) => {
    const storageReady = await ctx.store.isReady();
    return {
      status: storageReady ? ("ok" as const) : ("degraded" as const),
      storageReady,
      mode: ctx.mode,
      timezone: ctx.timezone,
    };
  }),
});

export type AppRouter = typeof appRouter;
