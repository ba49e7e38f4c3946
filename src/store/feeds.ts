import { and, asc, eq, isNull, sql } from "drizzle-orm";
import type { AppDatabase, DbExecutor } from "../db";
import { articles, categories, feeds } from "../db/schema";
import type { Feed } from "../db/schema";
import { NotFoundError, ValidationError, isUniqueViolation, toStorageError } from "../errors";
import { resolveCategoryId } from "./categories";

export type NewFeed = {
  readonly url: string;
  readonly categoryName?: string | null;
  readonly title?: string | null;
};

export type AddFeedResult =
  | { readonly success: true; readonly feed: Feed }
  | { readonly success: false; readonly error: ValidationError };

export type FeedSummary = Feed & {
  readonly categoryName: string | null;
  readonly unreadCount: number;
};

/**
 * Trims a feed URL and checks it is absolute http(s).
 * @throws ValidationError `invalid_feed_url`
 */
export function validateFeedUrl(url: string): string {
  const trimmed = url.trim();
  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new ValidationError("invalid_feed_url", `"${trimmed}" is not a valid URL`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ValidationError(
      "invalid_feed_url",
      `unsupported URL scheme ${parsed.protocol} in "${trimmed}"`,
    );
  }
  return trimmed;
}

export function findFeedByUrl(db: DbExecutor, url: string): Feed | undefined {
  return db.select().from(feeds).where(eq(feeds.url, url.trim())).get();
}

export function getFeed(db: DbExecutor, id: number): Feed | undefined {
  return db.select().from(feeds).where(eq(feeds.id, id)).get();
}

/**
 * Adds a feed, creating its category on first use. A URL that is already
 * subscribed and invalid input come back as a failed result rather than a
 * throw, so batch callers can report per item.
 */
export function addFeed(db: AppDatabase, input: NewFeed): AddFeedResult {
  try {
    const url = validateFeedUrl(input.url);

    const feed = db.transaction((tx) => {
      if (findFeedByUrl(tx, url)) {
        throw new ValidationError("duplicate_feed_url", `feed ${url} already exists`);
      }
      const categoryId = resolveCategoryId(tx, input.categoryName);
      const title = input.title?.trim() || null;
      return tx.insert(feeds).values({ url, title, categoryId }).returning().get();
    });

    return { success: true, feed };
  } catch (err) {
    if (err instanceof ValidationError) {
      return { success: false, error: err };
    }
    if (isUniqueViolation(err)) {
      return {
        success: false,
        error: new ValidationError("duplicate_feed_url", `feed ${input.url.trim()} already exists`),
      };
    }
    throw toStorageError(err);
  }
}

/**
 * Removes a feed and, through the foreign key, all of its articles.
 */
export function removeFeed(db: DbExecutor, id: number): boolean {
  return db.delete(feeds).where(eq(feeds.id, id)).run().changes > 0;
}

export function listFeeds(db: DbExecutor): Array<FeedSummary> {
  return db
    .select({
      id: feeds.id,
      url: feeds.url,
      title: feeds.title,
      categoryId: feeds.categoryId,
      lastSyncedAt: feeds.lastSyncedAt,
      lastError: feeds.lastError,
      createdAt: feeds.createdAt,
      categoryName: categories.name,
      unreadCount: sql<number>`(select count(*) from ${articles} where ${articles.feedId} = ${feeds.id} and ${articles.isRead} = 0)`,
    })
    .from(feeds)
    .leftJoin(categories, eq(feeds.categoryId, categories.id))
    .orderBy(asc(categories.name), asc(feeds.title), asc(feeds.id))
    .all();
}

/** Feed ids in sync order. */
export function listFeedIds(db: DbExecutor): Array<number> {
  return db
    .select({ id: feeds.id })
    .from(feeds)
    .orderBy(asc(feeds.id))
    .all()
    .map((row) => row.id);
}

/**
 * @throws NotFoundError, ValidationError `invalid_category_name`
 */
export function setFeedCategory(
  db: AppDatabase,
  feedId: number,
  categoryName: string | null,
): Feed {
  return db.transaction((tx) => {
    const categoryId = resolveCategoryId(tx, categoryName);
    const updated = tx
      .update(feeds)
      .set({ categoryId })
      .where(eq(feeds.id, feedId))
      .returning()
      .get();
    if (!updated) throw new NotFoundError("feed", feedId);
    return updated;
  });
}

/**
 * Sets or clears the display title. A cleared title is filled from the
 * document on the next successful sync.
 * @throws NotFoundError
 */
export function renameFeed(db: DbExecutor, feedId: number, title: string | null): Feed {
  const updated = db
    .update(feeds)
    .set({ title: title?.trim() || null })
    .where(eq(feeds.id, feedId))
    .returning()
    .get();
  if (!updated) throw new NotFoundError("feed", feedId);
  return updated;
}

export function recordSyncSuccess(
  db: DbExecutor,
  feedId: number,
  syncedAt: Date,
  documentTitle: string | null,
): void {
  db.update(feeds)
    .set({ lastSyncedAt: syncedAt, lastError: null })
    .where(eq(feeds.id, feedId))
    .run();

  if (documentTitle) {
    db.update(feeds)
      .set({ title: documentTitle })
      .where(and(eq(feeds.id, feedId), isNull(feeds.title)))
      .run();
  }
}

export function recordSyncFailure(db: DbExecutor, feedId: number, message: string): void {
  db.update(feeds).set({ lastError: message }).where(eq(feeds.id, feedId)).run();
}
