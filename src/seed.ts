import type { Logger } from "pino";
import type { AppDatabase } from "./db";
import type { AppConfig } from "./config";
import { feeds } from "./db/schema";
import { importFeeds } from "./import/importer";
import type { ImportReport } from "./import/types";

/**
 * Imports the feeds listed in the configuration file into an empty
 * database.
 *
 * Seeding happens only while the feeds table is empty: after the first run
 * the database is the source of truth, and feeds the user removed are not
 * brought back on restart.
 *
 * @returns the import report, or null when seeding was skipped
 */
export function seedDatabase(
  db: AppDatabase,
  config: AppConfig,
  logger: Logger,
): ImportReport | null {
  if (config.feeds.length === 0) {
    return null;
  }

  const existing = db.select({ id: feeds.id }).from(feeds).limit(1).all();
  if (existing.length > 0) {
    logger.info("feeds already exist, skipping seed");
    return null;
  }

  logger.info({ feedCount: config.feeds.length }, "seeding feeds from config");
  return importFeeds(
    db,
    config.feeds.map((feed) => ({
      url: feed.url,
      categoryName: feed.category ?? null,
      title: feed.title ?? null,
    })),
    logger,
  );
}
