// pattern: Imperative Shell
import { z } from "zod";
import { router, publicProcedure } from "../trpc";
import { importFeeds } from "../../import/importer";
import { readOpml } from "../../import/opml";

export const importsRouter = router({
  opml: publicProcedure
    .input(z.object({ document: z.string().min(1) }))
    .mutation(({ ctx, input }) => importFeeds(ctx.db, readOpml(input.document), ctx.logger)),

  feeds: publicProcedure
    .input(
      z.object({
        feeds: z.array(
          z.object({
            url: z.string().min(1),
            category: z.string().nullable().optional(),
            title: z.string().nullable().optional(),
          }),
        ),
      }),
    )
    .mutation(({ ctx, input }) =>
      importFeeds(
        ctx.db,
        input.feeds.map((feed) => ({
          url: feed.url,
          categoryName: feed.category ?? null,
          title: feed.title ?? null,
        })),
        ctx.logger,
      ),
    ),
});
