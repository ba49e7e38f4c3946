import { and, eq, inArray } from "drizzle-orm";
import type { Logger } from "pino";
import { articles } from "../db/schema";
import type { DbExecutor } from "../db";
import { toStorageError } from "../errors";
import { canonicalKey } from "./canonical-key";
import type { MergeResult, RawArticle } from "./types";

// Stays well under SQLite's bound-parameter limit
const LOOKUP_CHUNK = 500;

type StoredArticle = {
  readonly id: number;
  readonly canonicalKey: string;
  readonly title: string;
  readonly link: string | null;
  readonly content: string;
  readonly publishedAt: Date;
};

function toSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Whether the stored row is out of date. A fallback publication date (the
 * fetch time) is never compared, otherwise every sync would rewrite it.
 */
export function hasChanged(stored: StoredArticle, incoming: RawArticle): boolean {
  return (
    stored.title !== incoming.title ||
    stored.content !== incoming.content ||
    stored.link !== incoming.link ||
    (incoming.hasPublishedDate &&
      toSeconds(stored.publishedAt) !== toSeconds(incoming.publishedAt))
  );
}

/**
 * Keys each article, keeping the first of any repeated key in the batch.
 */
export function keyBatch(items: ReadonlyArray<RawArticle>): {
  readonly batch: ReadonlyMap<string, RawArticle>;
  readonly duplicates: number;
} {
  const batch = new Map<string, RawArticle>();
  let duplicates = 0;
  for (const item of items) {
    const key = canonicalKey(item);
    if (batch.has(key)) {
      duplicates++;
      continue;
    }
    batch.set(key, item);
  }
  return { batch, duplicates };
}

function chunk<T>(values: ReadonlyArray<T>, size: number): Array<Array<T>> {
  const chunks: Array<Array<T>> = [];
  for (let i = 0; i < values.length; i += size) {
    chunks.push(values.slice(i, i + size));
  }
  return chunks;
}

/**
 * Reconciles one feed's freshly parsed articles with what is stored, in a
 * single transaction: unknown keys are inserted unread and unsaved, known
 * keys whose title, content, link or date moved are updated in place, the
 * rest are left alone. Read and saved flags, `firstSeenAt` and
 * `fullContent` are never written here, and stored articles missing from
 * the batch are kept.
 *
 * Any database failure rolls the whole batch back and is rethrown as a
 * StorageError.
 */
export function mergeArticles(
  db: DbExecutor,
  feedId: number,
  items: ReadonlyArray<RawArticle>,
  logger: Logger,
  now: Date = new Date(),
): MergeResult {
  const { batch, duplicates } = keyBatch(items);

  let result: MergeResult;
  try {
    result = db.transaction(
      (tx) => {
        const existing = new Map<string, StoredArticle>();
        for (const keys of chunk([...batch.keys()], LOOKUP_CHUNK)) {
          const rows = tx
            .select({
              id: articles.id,
              canonicalKey: articles.canonicalKey,
              title: articles.title,
              link: articles.link,
              content: articles.content,
              publishedAt: articles.publishedAt,
            })
            .from(articles)
            .where(and(eq(articles.feedId, feedId), inArray(articles.canonicalKey, keys)))
            .all();
          for (const row of rows) existing.set(row.canonicalKey, row);
        }

        let added = 0;
        let updated = 0;
        let unchanged = 0;

        for (const [key, item] of batch) {
          const stored = existing.get(key);

          if (!stored) {
            tx.insert(articles)
              .values({
                feedId,
                canonicalKey: key,
                title: item.title,
                link: item.link,
                publishedAt: item.publishedAt,
                content: item.content,
                isRead: false,
                isSaved: false,
                firstSeenAt: now,
              })
              .run();
            added++;
            continue;
          }

          if (!hasChanged(stored, item)) {
            unchanged++;
            continue;
          }

          tx.update(articles)
            .set({
              title: item.title,
              link: item.link,
              content: item.content,
              updatedAt: now,
              ...(item.hasPublishedDate ? { publishedAt: item.publishedAt } : {}),
            })
            .where(eq(articles.id, stored.id))
            .run();
          updated++;
        }

        return { added, updated, unchanged, duplicates };
      },
      { behavior: "immediate" },
    );
  } catch (err) {
    throw toStorageError(err);
  }

  logger.info({ feedId, ...result }, "merge complete");
  return result;
}
