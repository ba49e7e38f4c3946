// pattern: Imperative Shell
import { z } from "zod";
import { router, publicProcedure } from "../trpc";
import { getSetting, listSettings, setSetting } from "../../store";

const key = z.string().min(1).max(100);

export const settingsRouter = router({
  list: publicProcedure.query(({ ctx }) => listSettings(ctx.db)),

  get: publicProcedure
    .input(z.object({ key }))
    .query(({ ctx, input }) => ({ key: input.key, value: getSetting(ctx.db, input.key) })),

  set: publicProcedure
    .input(z.object({ key, value: z.union([z.string(), z.boolean(), z.number()]) }))
    .mutation(({ ctx, input }) => {
      setSetting(ctx.db, input.key, input.value);
      return { key: input.key, value: String(input.value) };
    }),
});
