import type { Logger } from "pino";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import { NotFoundError } from "../errors";
import { getArticle, setFullContent } from "../store/articles";
import { fetchFeed } from "./fetcher";
import { extractReadableText } from "./html-text";
import type { FetchFeedFn } from "./types";

export type FullTextResult =
  | { readonly success: true; readonly articleId: number; readonly fullContent: string }
  | { readonly success: false; readonly articleId: number; readonly error: string };

/**
 * Downloads an article's web page and stores its readable text in
 * `fullContent`. Sync never touches that column, so the text survives
 * later updates of the feed summary.
 *
 * @throws NotFoundError when the article does not exist
 */
export async function fetchFullText(
  db: AppDatabase,
  articleId: number,
  config: AppConfig,
  logger: Logger,
  fetchDocument: FetchFeedFn = fetchFeed,
): Promise<FullTextResult> {
  const article = getArticle(db, articleId);
  if (!article) throw new NotFoundError("article", articleId);

  if (!article.link) {
    return { success: false, articleId, error: "article has no link" };
  }

  const fetched = await fetchDocument(
    article.link,
    {
      timeoutMs: config.fullText.timeoutMs,
      retries: config.sync.retries,
      retryDelayMs: config.sync.retryDelayMs,
      userAgent: config.sync.userAgent,
      accept: "text/html,application/xhtml+xml",
    },
    logger,
  );
  if (!fetched.success) {
    return { success: false, articleId, error: fetched.error.message };
  }

  const fullContent = extractReadableText(fetched.body, config.fullText.selectors);
  if (fullContent.length === 0) {
    logger.warn({ articleId, url: article.link }, "no readable text found on article page");
    return { success: false, articleId, error: "no readable text found" };
  }

  setFullContent(db, articleId, fullContent);
  logger.debug({ articleId, textLength: fullContent.length }, "full text stored");
  return { success: true, articleId, fullContent };
}
