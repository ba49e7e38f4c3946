// pattern: Functional Core
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import type { Logger } from "pino";
import type { SyncEngine } from "../pipeline/sync";
import type { FetchFeedFn } from "../pipeline/types";

/**
 * tRPC context passed to all procedures: storage, configuration, logger,
 * the sync orchestrator, and the fetcher used for full-text retrieval.
 */
export type AppContext = {
  readonly db: AppDatabase;
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly engine: SyncEngine;
  readonly fetchDocument: FetchFeedFn;
};
