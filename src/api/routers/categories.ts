// pattern: Imperative Shell
import { z } from "zod";
import { router, publicProcedure } from "../trpc";
import {
  createCategory,
  deleteCategory,
  listCategories,
  renameCategory,
} from "../../store";

export const categoriesRouter = router({
  list: publicProcedure.query(({ ctx }) => listCategories(ctx.db)),

  create: publicProcedure
    .input(z.object({ name: z.string() }))
    .mutation(({ ctx, input }) => createCategory(ctx.db, input.name)),

  rename: publicProcedure
    .input(z.object({ id: z.number().int().positive(), name: z.string() }))
    .mutation(({ ctx, input }) => renameCategory(ctx.db, input.id, input.name)),

  delete: publicProcedure
    .input(z.object({ id: z.number().int().positive() }))
    .mutation(({ ctx, input }) => {
      const reassignedFeeds = deleteCategory(ctx.db, input.id);
      return { success: true, reassignedFeeds };
    }),
});
