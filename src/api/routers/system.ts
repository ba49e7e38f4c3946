// pattern: Imperative Shell
import { router, publicProcedure } from "../trpc";
import { articles, feeds } from "../../db/schema";
import { sql, desc, isNotNull } from "drizzle-orm";

export const systemRouter = router({
  status: publicProcedure.query(({ ctx }) => {
    const feedCount = ctx.db
      .select({ count: sql<number>`count(*)` })
      .from(feeds)
      .get()?.count ?? 0;

    const failingFeedCount = ctx.db
      .select({ count: sql<number>`count(*)` })
      .from(feeds)
      .where(isNotNull(feeds.lastError))
      .get()?.count ?? 0;

    const articleCounts = ctx.db
      .select({
        total: sql<number>`count(*)`,
        unread: sql<number>`coalesce(sum(case when ${articles.isRead} = 0 then 1 else 0 end), 0)`,
        saved: sql<number>`coalesce(sum(case when ${articles.isSaved} = 1 then 1 else 0 end), 0)`,
      })
      .from(articles)
      .get();

    const lastSync = ctx.db
      .select({ lastSyncedAt: feeds.lastSyncedAt })
      .from(feeds)
      .where(isNotNull(feeds.lastSyncedAt))
      .orderBy(desc(feeds.lastSyncedAt))
      .get();

    return {
      lastSyncTime: lastSync?.lastSyncedAt ?? null,
      syncSchedule: ctx.config.schedule.sync ?? null,
      maxConcurrency: ctx.config.sync.maxConcurrency,
      feedCount,
      failingFeedCount,
      articleCount: articleCounts?.total ?? 0,
      unreadCount: articleCounts?.unread ?? 0,
      savedCount: articleCounts?.saved ?? 0,
    };
  }),
});
