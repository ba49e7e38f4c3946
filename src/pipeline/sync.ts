// pattern: Imperative Shell
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { AppDatabase } from "../db";
import type { SyncConfig } from "../config";
import { NotFoundError, errorMessage, toStorageError } from "../errors";
import {
  getFeed,
  listFeedIds,
  recordSyncFailure,
  recordSyncSuccess,
} from "../store/feeds";
import { fetchFeed } from "./fetcher";
import { createKeyedLock } from "./feed-lock";
import { mergeArticles } from "./merge";
import { parseFeed } from "./parser";
import type {
  FeedSyncState,
  FetchFeedFn,
  FetchOptions,
  SyncProgressEvent,
  SyncResult,
  SyncStage,
} from "./types";

export type SyncEngineDeps = {
  readonly db: AppDatabase;
  readonly config: SyncConfig;
  readonly logger: Logger;
  readonly fetchFeed?: FetchFeedFn;
  readonly now?: () => Date;
};

export type SyncOptions = {
  /** Once aborted, feeds whose pipeline has not started are reported cancelled. */
  readonly signal?: AbortSignal;
  readonly onProgress?: (event: SyncProgressEvent) => void;
};

export type SyncEngine = {
  readonly syncAll: (options?: SyncOptions) => Promise<Array<SyncResult>>;
  readonly syncOne: (feedId: number, options?: SyncOptions) => Promise<SyncResult>;
  readonly isSyncing: (feedId: number) => boolean;
};

function cancelled(feedId: number): SyncResult {
  return { feedId, status: "cancelled", articlesAdded: 0, articlesUpdated: 0, error: null };
}

/**
 * Builds the sync orchestrator. Each feed runs fetch → parse → merge in
 * sequence; up to `config.maxConcurrency` feeds run at once, and a keyed
 * lock keeps at most one pipeline per feed in flight across `syncAll` and
 * `syncOne` calls.
 */
export function createSyncEngine(deps: SyncEngineDeps): SyncEngine {
  const { db, config, logger } = deps;
  const fetchDocument = deps.fetchFeed ?? fetchFeed;
  const now = deps.now ?? (() => new Date());
  const lock = createKeyedLock<number>();

  const fetchOptions: FetchOptions = {
    timeoutMs: config.timeoutMs,
    retries: config.retries,
    retryDelayMs: config.retryDelayMs,
    userAgent: config.userAgent,
  };

  async function runPipeline(feedId: number, options: SyncOptions): Promise<SyncResult> {
    const log = logger.child({ feedId });
    const emit = (state: FeedSyncState): void => {
      options.onProgress?.({ type: "state", feedId, state });
    };

    let stage: SyncStage = "fetching";

    const fail = (code: string, message: string): SyncResult => {
      try {
        recordSyncFailure(db, feedId, `${stage}: ${message}`);
      } catch (err) {
        log.error({ error: errorMessage(err) }, "could not record sync failure");
      }
      log.warn({ stage, code, error: message }, "feed sync failed");
      emit("failed");
      return {
        feedId,
        status: "failed",
        articlesAdded: 0,
        articlesUpdated: 0,
        error: { stage, code, message },
      };
    };

    try {
      const feed = getFeed(db, feedId);
      if (!feed) {
        return fail("feed_removed", `feed ${feedId} no longer exists`);
      }

      emit("fetching");
      const fetched = await fetchDocument(feed.url, fetchOptions, log);
      if (!fetched.success) {
        return fail(fetched.error.code, fetched.error.message);
      }

      stage = "parsing";
      emit("parsing");
      const parsed = parseFeed(fetched.body, { fetchedAt: now(), baseUrl: feed.url }, log);
      if (!parsed.success) {
        return fail(parsed.error.code, parsed.error.message);
      }

      stage = "merging";
      emit("merging");
      const mergedAt = now();
      const merged = db.transaction(
        (tx) => {
          const result = mergeArticles(tx, feedId, parsed.feed.articles, log, mergedAt);
          recordSyncSuccess(tx, feedId, mergedAt, parsed.feed.title);
          return result;
        },
        { behavior: "immediate" },
      );

      emit("done");
      return {
        feedId,
        status: "done",
        articlesAdded: merged.added,
        articlesUpdated: merged.updated,
        error: null,
      };
    } catch (err) {
      if (stage === "merging") {
        const storage = toStorageError(err);
        return fail(storage.code, storage.message);
      }
      return fail("unexpected", errorMessage(err));
    }
  }

  function dispatch(feedId: number, options: SyncOptions): Promise<SyncResult> {
    if (options.signal?.aborted) return Promise.resolve(cancelled(feedId));
    return lock.run(feedId, () =>
      options.signal?.aborted
        ? Promise.resolve(cancelled(feedId))
        : runPipeline(feedId, options),
    );
  }

  function report(result: SyncResult, options: SyncOptions): SyncResult {
    options.onProgress?.({ type: "completed", result });
    return result;
  }

  return {
    syncAll: async (options: SyncOptions = {}) => {
      const feedIds = listFeedIds(db);
      const limit = pLimit(config.maxConcurrency);

      logger.info(
        { feedCount: feedIds.length, maxConcurrency: config.maxConcurrency },
        "sync pass starting",
      );
      for (const feedId of feedIds) {
        options.onProgress?.({ type: "state", feedId, state: "pending" });
      }

      const results = await Promise.all(
        feedIds.map((feedId) =>
          limit(async () => report(await dispatch(feedId, options), options)),
        ),
      );

      const totals = results.reduce(
        (acc, r) => ({
          added: acc.added + r.articlesAdded,
          updated: acc.updated + r.articlesUpdated,
          failed: acc.failed + (r.status === "failed" ? 1 : 0),
          cancelled: acc.cancelled + (r.status === "cancelled" ? 1 : 0),
        }),
        { added: 0, updated: 0, failed: 0, cancelled: 0 },
      );
      logger.info({ feedCount: feedIds.length, ...totals }, "sync pass complete");

      return results;
    },

    syncOne: async (feedId: number, options: SyncOptions = {}) => {
      if (!getFeed(db, feedId)) {
        throw new NotFoundError("feed", feedId);
      }
      options.onProgress?.({ type: "state", feedId, state: "pending" });
      return report(await dispatch(feedId, options), options);
    },

    isSyncing: (feedId: number) => lock.isLocked(feedId),
  };
}
