// pattern: Imperative Shell
import { z } from "zod";
import { router, publicProcedure } from "../trpc";
import { NotFoundError } from "../../errors";
import {
  getArticle,
  listArticles,
  markRead,
  searchArticles,
  take,
  toggleSaved,
} from "../../store";
import { fetchFullText } from "../../pipeline";

const idInput = z.object({ id: z.number().int().positive() });

const markReadTarget = z.discriminatedUnion("scope", [
  z.object({ scope: z.literal("article"), articleId: z.number().int().positive() }),
  z.object({ scope: z.literal("feed"), feedId: z.number().int().positive() }),
  z.object({ scope: z.literal("category"), categoryId: z.number().int().positive().nullable() }),
  z.object({ scope: z.literal("all") }),
]);

/**
 * Reading side of the store plus the user-state mutations (read, saved)
 * and on-demand full text.
 */
export const articlesRouter = router({
  list: publicProcedure
    .input(
      z.object({
        feedId: z.number().int().positive().optional(),
        categoryId: z.number().int().positive().nullable().optional(),
        unreadOnly: z.boolean().default(false),
        savedOnly: z.boolean().default(false),
        limit: z.number().int().positive().max(500).default(100),
        offset: z.number().int().nonnegative().default(0),
      }),
    )
    .query(({ ctx, input }) => listArticles(ctx.db, input)),

  getById: publicProcedure.input(idInput).query(({ ctx, input }) => {
    return getArticle(ctx.db, input.id) ?? null;
  }),

  markRead: publicProcedure
    .input(z.object({ target: markReadTarget, isRead: z.boolean().default(true) }))
    .mutation(({ ctx, input }) => {
      const changed = markRead(ctx.db, input.target, input.isRead);
      return { changed };
    }),

  toggleSaved: publicProcedure.input(idInput).mutation(({ ctx, input }) => {
    const isSaved = toggleSaved(ctx.db, input.id);
    if (isSaved === null) throw new NotFoundError("article", input.id);
    return { id: input.id, isSaved };
  }),

  search: publicProcedure
    .input(
      z.object({
        query: z.string().min(1),
        limit: z.number().int().positive().max(500).default(50),
      }),
    )
    .query(({ ctx, input }) =>
      take(searchArticles(ctx.db, input.query, { pageSize: input.limit }), input.limit),
    ),

  fetchFullText: publicProcedure.input(idInput).mutation(({ ctx, input }) => {
    return fetchFullText(ctx.db, input.id, ctx.config, ctx.logger, ctx.fetchDocument);
  }),
});
