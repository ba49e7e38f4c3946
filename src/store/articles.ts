import { and, desc, eq, gte, inArray, isNull, lt, or, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { AppDatabase, DbExecutor } from "../db";
import { articles, feeds } from "../db/schema";
import type { Article } from "../db/schema";

export type ArticleWithFeed = Article & { readonly feedTitle: string | null };

export type MarkReadTarget =
  | { readonly scope: "article"; readonly articleId: number }
  | { readonly scope: "feed"; readonly feedId: number }
  | { readonly scope: "category"; readonly categoryId: number | null }
  | { readonly scope: "all" };

export type ArticleFilters = {
  readonly feedId?: number;
  /** null selects uncategorized feeds */
  readonly categoryId?: number | null;
  readonly unreadOnly?: boolean;
  readonly savedOnly?: boolean;
  readonly limit?: number;
  readonly offset?: number;
};

const articleWithFeedColumns = {
  id: articles.id,
  feedId: articles.feedId,
  canonicalKey: articles.canonicalKey,
  title: articles.title,
  link: articles.link,
  publishedAt: articles.publishedAt,
  content: articles.content,
  fullContent: articles.fullContent,
  isRead: articles.isRead,
  isSaved: articles.isSaved,
  firstSeenAt: articles.firstSeenAt,
  updatedAt: articles.updatedAt,
  feedTitle: feeds.title,
};

function feedsInCategory(db: DbExecutor, categoryId: number | null) {
  return db
    .select({ id: feeds.id })
    .from(feeds)
    .where(categoryId === null ? isNull(feeds.categoryId) : eq(feeds.categoryId, categoryId));
}

function targetCondition(db: DbExecutor, target: MarkReadTarget): SQL | undefined {
  switch (target.scope) {
    case "article":
      return eq(articles.id, target.articleId);
    case "feed":
      return eq(articles.feedId, target.feedId);
    case "category":
      return inArray(articles.feedId, feedsInCategory(db, target.categoryId));
    case "all":
      return undefined;
  }
}

/**
 * Sets the read flag on one article, a feed, a category or everything.
 * @returns the number of articles whose flag changed
 */
export function markRead(db: DbExecutor, target: MarkReadTarget, isRead = true): number {
  const scope = targetCondition(db, target);
  const changing = eq(articles.isRead, !isRead);
  return db
    .update(articles)
    .set({ isRead })
    .where(scope ? and(scope, changing) : changing)
    .run().changes;
}

/**
 * Flips the saved flag.
 * @returns the new flag, or null when the article does not exist
 */
export function toggleSaved(db: AppDatabase, articleId: number): boolean | null {
  return db.transaction((tx) => {
    const row = tx
      .select({ isSaved: articles.isSaved })
      .from(articles)
      .where(eq(articles.id, articleId))
      .get();
    if (!row) return null;

    const next = !row.isSaved;
    tx.update(articles).set({ isSaved: next }).where(eq(articles.id, articleId)).run();
    return next;
  });
}

export function getArticle(db: DbExecutor, id: number): ArticleWithFeed | undefined {
  return db
    .select(articleWithFeedColumns)
    .from(articles)
    .innerJoin(feeds, eq(articles.feedId, feeds.id))
    .where(eq(articles.id, id))
    .get();
}

export function listArticles(db: DbExecutor, filters: ArticleFilters = {}): Array<ArticleWithFeed> {
  const conditions: Array<SQL> = [];
  if (filters.feedId !== undefined) {
    conditions.push(eq(articles.feedId, filters.feedId));
  }
  if (filters.categoryId !== undefined) {
    conditions.push(
      filters.categoryId === null
        ? isNull(feeds.categoryId)
        : eq(feeds.categoryId, filters.categoryId),
    );
  }
  if (filters.unreadOnly) conditions.push(eq(articles.isRead, false));
  if (filters.savedOnly) conditions.push(eq(articles.isSaved, true));

  return db
    .select(articleWithFeedColumns)
    .from(articles)
    .innerJoin(feeds, eq(articles.feedId, feeds.id))
    .where(conditions.length > 0 ? and(...conditions) : undefined)
    .orderBy(desc(articles.publishedAt), desc(articles.id))
    .limit(filters.limit ?? 100)
    .offset(filters.offset ?? 0)
    .all();
}

export function unreadCounts(db: DbExecutor): Array<{ feedId: number; unread: number }> {
  return db
    .select({ feedId: articles.feedId, unread: sql<number>`count(*)` })
    .from(articles)
    .where(eq(articles.isRead, false))
    .groupBy(articles.feedId)
    .all();
}

/**
 * Articles published at or after `since`, newest first. This is the input
 * of the daily briefing.
 */
export function articlesSince(
  db: DbExecutor,
  since: Date,
  limit?: number,
): Array<ArticleWithFeed> {
  const query = db
    .select(articleWithFeedColumns)
    .from(articles)
    .innerJoin(feeds, eq(articles.feedId, feeds.id))
    .where(gte(articles.publishedAt, since))
    .orderBy(desc(articles.publishedAt), desc(articles.id));
  return limit === undefined ? query.all() : query.limit(limit).all();
}

/** Escapes LIKE wildcards so the query matches literally. */
export function likePattern(query: string): string {
  return `%${query.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

/**
 * Articles whose title or content contains `query`, newest id first.
 *
 * The result is lazy and restartable: every iteration starts a fresh
 * keyset-paged scan, so rows committed in between are seen by the next
 * iteration, and each iteration ends once a short page comes back.
 */
export function searchArticles(
  db: DbExecutor,
  query: string,
  options: { readonly pageSize?: number } = {},
): Iterable<ArticleWithFeed> {
  const pageSize = options.pageSize ?? 50;
  const pattern = likePattern(query.trim());
  const matches = or(
    sql`${articles.title} like ${pattern} escape '\\'`,
    sql`${articles.content} like ${pattern} escape '\\'`,
  );

  return {
    *[Symbol.iterator]() {
      let cursor: number | null = null;
      for (;;) {
        const page: Array<ArticleWithFeed> = db
          .select(articleWithFeedColumns)
          .from(articles)
          .innerJoin(feeds, eq(articles.feedId, feeds.id))
          .where(cursor === null ? matches : and(matches, lt(articles.id, cursor)))
          .orderBy(desc(articles.id))
          .limit(pageSize)
          .all();

        yield* page;

        const last = page[page.length - 1];
        if (page.length < pageSize || last === undefined) return;
        cursor = last.id;
      }
    },
  };
}

/** First `limit` items of an iterable. */
export function take<T>(items: Iterable<T>, limit: number): Array<T> {
  const taken: Array<T> = [];
  if (limit <= 0) return taken;
  for (const item of items) {
    taken.push(item);
    if (taken.length >= limit) break;
  }
  return taken;
}

export function setFullContent(db: DbExecutor, articleId: number, fullContent: string): void {
  db.update(articles).set({ fullContent }).where(eq(articles.id, articleId)).run();
}
