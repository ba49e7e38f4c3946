// pattern: Imperative Shell
import { z } from "zod";
import { router, publicProcedure } from "../trpc";
import {
  addFeed,
  getFeed,
  listFeeds,
  removeFeed,
  renameFeed,
  setFeedCategory,
  unreadCounts,
} from "../../store";

const idInput = z.object({ id: z.number().int().positive() });

/**
 * Feed subscriptions: listing with unread counts, add, remove, recategorize
 * and rename.
 */
export const feedsRouter = router({
  list: publicProcedure.query(({ ctx }) => listFeeds(ctx.db)),

  getById: publicProcedure.input(idInput).query(({ ctx, input }) => {
    return getFeed(ctx.db, input.id) ?? null;
  }),

  add: publicProcedure
    .input(
      z.object({
        url: z.string().min(1),
        category: z.string().nullable().optional(),
        title: z.string().nullable().optional(),
      }),
    )
    .mutation(({ ctx, input }) => {
      const result = addFeed(ctx.db, {
        url: input.url,
        categoryName: input.category ?? null,
        title: input.title ?? null,
      });
      if (!result.success) throw result.error;
      ctx.logger.info({ feedId: result.feed.id, url: result.feed.url }, "feed added");
      return result.feed;
    }),

  remove: publicProcedure.input(idInput).mutation(({ ctx, input }) => {
    const removed = removeFeed(ctx.db, input.id);
    if (removed) ctx.logger.info({ feedId: input.id }, "feed removed");
    return { success: removed };
  }),

  setCategory: publicProcedure
    .input(z.object({ id: z.number().int().positive(), category: z.string().nullable() }))
    .mutation(({ ctx, input }) => setFeedCategory(ctx.db, input.id, input.category)),

  rename: publicProcedure
    .input(z.object({ id: z.number().int().positive(), title: z.string().nullable() }))
    .mutation(({ ctx, input }) => renameFeed(ctx.db, input.id, input.title)),

  unreadCounts: publicProcedure.query(({ ctx }) => unreadCounts(ctx.db)),
});
