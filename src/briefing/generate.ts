// pattern: Imperative Shell
import type { Logger } from "pino";
import type { DbExecutor } from "../db";
import { articlesSince } from "../store/articles";
import { buildBriefingInput } from "./builder";
import type { BriefingInput } from "./builder";

/**
 * The text generator behind the briefing. The application supplies it;
 * the core only assembles its input.
 */
export type Summarizer = (input: BriefingInput) => Promise<string>;

export type BriefingResult =
  | { readonly status: "empty" }
  | { readonly status: "generated"; readonly articleCount: number; readonly text: string }
  | { readonly status: "failed"; readonly articleCount: number; readonly error: string };

export const DEFAULT_BRIEFING_LIMIT = 15;

/**
 * Collects the articles published since `since` and hands them to the
 * summarizer. Summarizer failures are returned, not thrown.
 *
 * Library entry point for a host application that owns a text generator.
 * The service itself ships none; its `briefing.input` procedure returns the
 * same input for the front end to summarize.
 */
export async function generateBriefing(
  db: DbExecutor,
  since: Date,
  summarize: Summarizer,
  logger: Logger,
  limit = DEFAULT_BRIEFING_LIMIT,
): Promise<BriefingResult> {
  const rows = articlesSince(db, since, limit);
  if (rows.length === 0) {
    logger.info({ since: since.toISOString() }, "no articles for briefing");
    return { status: "empty" };
  }

  const input = buildBriefingInput(rows);
  try {
    const text = await summarize(input);
    logger.info({ articleCount: input.articleCount }, "briefing generated");
    return { status: "generated", articleCount: input.articleCount, text };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ error: message }, "briefing summarizer failed");
    return { status: "failed", articleCount: input.articleCount, error: message };
  }
}
