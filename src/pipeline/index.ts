export { fetchFeed } from "./fetcher";
export { parseFeed } from "./parser";
export { canonicalKey, normalizeLink, normalizeTitle } from "./canonical-key";
export { mergeArticles } from "./merge";
export { createSyncEngine } from "./sync";
export { fetchFullText } from "./full-text";
export type {
  FeedDialect,
  RawArticle,
  ParsedFeed,
  ParseResult,
  FetchOptions,
  FetchResult,
  FetchFeedFn,
  MergeResult,
  FeedSyncState,
  SyncResult,
  SyncProgressEvent,
} from "./types";
export type { SyncEngine, SyncOptions } from "./sync";
export type { FullTextResult } from "./full-text";
