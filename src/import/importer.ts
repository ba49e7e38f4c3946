import type { Logger } from "pino";
import type { AppDatabase } from "../db";
import { addFeed } from "../store/feeds";
import type { FeedSpec, ImportItem, ImportReport } from "./types";

/**
 * Adds every spec through the regular add-feed path. Repeated URLs within
 * the batch and URLs that are already subscribed are reported as skipped;
 * invalid entries are reported as failed. The batch always runs to the end.
 */
export function importFeeds(
  db: AppDatabase,
  specs: ReadonlyArray<FeedSpec>,
  logger: Logger,
): ImportReport {
  const seen = new Set<string>();
  const items: Array<ImportItem> = [];

  for (const spec of specs) {
    const url = spec.url.trim();

    if (seen.has(url)) {
      items.push({ url, status: "skipped", reason: "duplicate_in_batch" });
      continue;
    }
    seen.add(url);

    const result = addFeed(db, {
      url,
      categoryName: spec.categoryName,
      title: spec.title,
    });

    if (result.success) {
      items.push({ url, status: "added", feedId: result.feed.id });
    } else if (result.error.code === "duplicate_feed_url") {
      items.push({ url, status: "skipped", reason: "already_exists" });
    } else {
      logger.warn({ url, code: result.error.code, error: result.error.message }, "feed import failed");
      items.push({
        url,
        status: "failed",
        error: { code: result.error.code, message: result.error.message },
      });
    }
  }

  const count = (status: ImportItem["status"]) =>
    items.filter((item) => item.status === status).length;
  const report: ImportReport = {
    added: count("added"),
    skipped: count("skipped"),
    failed: count("failed"),
    items,
  };

  logger.info(
    { added: report.added, skipped: report.skipped, failed: report.failed },
    "feed import complete",
  );
  return report;
}
