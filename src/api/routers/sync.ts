// pattern: Imperative Shell
import { z } from "zod";
import { router, publicProcedure } from "../trpc";

export const syncRouter = router({
  all: publicProcedure.mutation(({ ctx }) => ctx.engine.syncAll()),

  one: publicProcedure
    .input(z.object({ id: z.number().int().positive() }))
    .mutation(({ ctx, input }) => ctx.engine.syncOne(input.id)),

  status: publicProcedure
    .input(z.object({ id: z.number().int().positive() }))
    .query(({ ctx, input }) => ({ syncing: ctx.engine.isSyncing(input.id) })),
});
