// pattern: Functional Core
import type { ArticleWithFeed } from "../store/articles";

const SNIPPET_LENGTH = 500;

export const BRIEFING_INSTRUCTIONS =
  "You are a helpful news assistant. Summarize the provided news articles into a " +
  "structured 'Daily Briefing'. Group them by topic if possible. Use Markdown " +
  "formatting with bold headers and bullet points. Start with a 'Key Takeaways' section.";

/**
 * Text handed to the summarizer: the instructions plus one block per
 * article (title, feed, first characters of the content on one line).
 */
export type BriefingInput = Readonly<{
  instructions: string;
  articleText: string;
  articleCount: number;
}>;

export function snippet(content: string, length = SNIPPET_LENGTH): string {
  return content.slice(0, length).replace(/\s*\n\s*/g, " ").trim();
}

export function buildBriefingInput(rows: ReadonlyArray<ArticleWithFeed>): BriefingInput {
  const articleText = rows
    .map(
      (row) =>
        `Title: ${row.title}\nSource: ${row.feedTitle ?? "Unknown feed"}\nContent: ${snippet(row.content)}\n---\n`,
    )
    .join("");

  return {
    instructions: BRIEFING_INSTRUCTIONS,
    articleText,
    articleCount: rows.length,
  };
}
