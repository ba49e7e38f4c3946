import type { Logger } from "pino";
import type { FeedFetchError, FeedParseError } from "../errors";

export type FeedDialect = "rss" | "atom" | "rdf";

/**
 * One entry of a feed document, normalized across dialects.
 * `publishedAt` falls back to the fetch time; `hasPublishedDate` tells
 * whether the document supplied a usable date.
 */
export type RawArticle = {
  readonly guid: string | null;
  readonly link: string | null;
  readonly title: string;
  readonly publishedAt: Date;
  readonly hasPublishedDate: boolean;
  readonly content: string;
};

export type ParsedFeed = {
  readonly dialect: FeedDialect;
  readonly title: string | null;
  readonly articles: ReadonlyArray<RawArticle>;
};

export type ParseResult =
  | { readonly success: true; readonly feed: ParsedFeed }
  | { readonly success: false; readonly error: FeedParseError };

export type FetchOptions = {
  readonly timeoutMs: number;
  readonly retries: number;
  readonly retryDelayMs: number;
  readonly userAgent: string;
  readonly accept?: string;
};

export type FetchResult =
  | {
      readonly success: true;
      readonly url: string;
      readonly status: number;
      readonly contentType: string | null;
      readonly body: string;
    }
  | { readonly success: false; readonly url: string; readonly error: FeedFetchError };

export type FetchFeedFn = (
  url: string,
  options: FetchOptions,
  logger: Logger,
) => Promise<FetchResult>;

export type MergeResult = {
  readonly added: number;
  readonly updated: number;
  readonly unchanged: number;
  readonly duplicates: number;
};

export type FeedSyncState =
  | "pending"
  | "fetching"
  | "parsing"
  | "merging"
  | "done"
  | "failed";

export type SyncStage = "fetching" | "parsing" | "merging";

export type SyncFailure = {
  readonly stage: SyncStage;
  readonly code: string;
  readonly message: string;
};

export type SyncResult = {
  readonly feedId: number;
  readonly status: "done" | "failed" | "cancelled";
  readonly articlesAdded: number;
  readonly articlesUpdated: number;
  readonly error: SyncFailure | null;
};

export type SyncProgressEvent =
  | { readonly type: "state"; readonly feedId: number; readonly state: FeedSyncState }
  | { readonly type: "completed"; readonly result: SyncResult };
