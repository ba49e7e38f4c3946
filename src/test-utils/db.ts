import pino from "pino";
import { createDatabase, migrateDatabase } from "../db";
import type { AppDatabase } from "../db";
import { parseConfig } from "../config";
import type { AppConfig } from "../config";
import { articles, categories, feeds } from "../db/schema";
import { createCallerFactory } from "../api/trpc";
import { appRouter } from "../api/router";
import { createSyncEngine } from "../pipeline/sync";
import type { FetchFeedFn } from "../pipeline/types";
import { FeedFetchError } from "../errors";

/**
 * Creates an in-memory SQLite test database with all migrations applied.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  migrateDatabase(db, "./drizzle");
  return db;
}

export const silentLogger = pino({ level: "silent" });

/**
 * Seeds a feed with optional field overrides.
 * @returns The ID of the inserted feed.
 */
export function seedTestFeed(
  db: AppDatabase,
  overrides?: Partial<typeof feeds.$inferInsert>,
): number {
  return db
    .insert(feeds)
    .values({
      url: `https://example.com/feed-${Math.random().toString(36).slice(2)}.xml`,
      title: "Test Feed",
      ...overrides,
    })
    .returning({ id: feeds.id })
    .get().id;
}

export function seedTestCategory(db: AppDatabase, name = "Tech"): number {
  return db.insert(categories).values({ name }).returning({ id: categories.id }).get().id;
}

/**
 * Seeds an article into a feed with optional field overrides.
 * @returns The ID of the inserted article.
 */
export function seedTestArticle(
  db: AppDatabase,
  feedId: number,
  overrides?: Partial<typeof articles.$inferInsert>,
): number {
  return db
    .insert(articles)
    .values({
      feedId,
      canonicalKey: `guid:${Math.random().toString(36).slice(2)}`,
      title: "Test Article",
      link: "https://example.com/article",
      publishedAt: new Date("2026-01-05T10:00:00Z"),
      content: "Article body",
      firstSeenAt: new Date("2026-01-05T10:05:00Z"),
      ...overrides,
    })
    .returning({ id: articles.id })
    .get().id;
}

/**
 * Defaults for every section, as an empty config file yields.
 */
export function createTestConfig(): AppConfig {
  return parseConfig("");
}

/** A fetch stand-in that fails every request with a network error. */
export const offlineFetch: FetchFeedFn = async (url) => ({
  success: false,
  url,
  error: new FeedFetchError("network", "offline"),
});

/**
 * Creates a fully-typed tRPC caller for testing router procedures directly.
 * Network access goes through `fetchDocument`, offline by default.
 */
export function createTestCaller(
  db: AppDatabase,
  options: { readonly config?: AppConfig; readonly fetchDocument?: FetchFeedFn } = {},
) {
  const createCaller = createCallerFactory(appRouter);
  const config = options.config ?? createTestConfig();
  const fetchDocument = options.fetchDocument ?? offlineFetch;
  const engine = createSyncEngine({
    db,
    config: config.sync,
    logger: silentLogger,
    fetchFeed: fetchDocument,
  });

  return createCaller({ db, config, logger: silentLogger, engine, fetchDocument });
}
