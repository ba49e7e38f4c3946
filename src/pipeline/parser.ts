// pattern: functional-core
import { z } from "zod";
import type { Logger } from "pino";
import { FeedParseError } from "../errors";
import { DIALECT_READERS, detectDialect } from "./dialects";
import type { EntryFields, TitleText } from "./dialects";
import { parseFeedDate } from "./dates";
import { htmlToText } from "./html-text";
import { isNode, readXml } from "./xml";
import type { ParseResult, RawArticle } from "./types";

export type ParseOptions = {
  /** Substituted for entries without a usable date. */
  readonly fetchedAt: Date;
  /** Document URL; relative entry links are resolved against it. */
  readonly baseUrl?: string;
};

const UNTITLED = "Untitled";

const INLINE_TAGS = "a|abbr|b|br|cite|code|del|em|i|img|ins|mark|q|s|small|span|strong|sub|sup|u";
const TAG_TAIL = `(?:\\s+[\\w:-]+(?:\\s*=\\s*(?:"[^"]*"|'[^']*'|[^\\s"'<>]+))?)*\\s*\\/?>`;
const INLINE_TAG = new RegExp(`<\\/?(?:${INLINE_TAGS})${TAG_TAIL}`, "i");
// A `<` that does not open one of the inline tags above
const STRAY_LT = new RegExp(`<(?!\\/?(?:${INLINE_TAGS})${TAG_TAIL})`, "gi");

const titleTextSchema = z.object({ text: z.string(), html: z.boolean() });

const entryFieldsSchema = z
  .object({
    guid: z.string().nullable(),
    link: z.string().nullable(),
    title: titleTextSchema.nullable(),
    date: z.string().nullable(),
    contentHtml: z.string().nullable(),
  })
  .refine((entry) => entry.guid !== null || entry.link !== null || entry.title !== null, {
    message: "entry has no guid, link or title",
  });

function resolveLink(link: string | null, baseUrl: string | undefined): string | null {
  if (link === null) return null;
  try {
    const resolved = new URL(link, baseUrl);
    return resolved.protocol === "http:" || resolved.protocol === "https:"
      ? resolved.toString()
      : null;
  } catch {
    return null;
  }
}

/**
 * Plain text of a title. Markup is stripped when the title is declared HTML;
 * an undeclared title loses only well-formed inline tags, and any other `<`
 * in it is literal text. Entities are decoded either way.
 */
export function cleanTitle(title: TitleText | null): string | null {
  if (title === null) return null;
  let markup: string;
  if (title.html) {
    markup = title.text;
  } else if (INLINE_TAG.test(title.text)) {
    markup = title.text.replace(STRAY_LT, "&lt;");
  } else {
    markup = title.text.replace(/</g, "&lt;");
  }
  const flattened = htmlToText(markup).replace(/\s+/g, " ").trim();
  return flattened.length > 0 ? flattened : null;
}

function toRawArticle(fields: EntryFields, options: ParseOptions): RawArticle {
  const published = parseFeedDate(fields.date);
  return {
    guid: fields.guid,
    link: resolveLink(fields.link, options.baseUrl),
    title: cleanTitle(fields.title) ?? UNTITLED,
    publishedAt: published ?? options.fetchedAt,
    hasPublishedDate: published !== null,
    content: fields.contentHtml ? htmlToText(fields.contentHtml) : "",
  };
}

/**
 * Normalizes an RSS 2.0, Atom or RDF/RSS 1.0 document into articles in
 * document order. The dialect is chosen from the root element only.
 *
 * A document that is not well-formed fails with `malformed_document`; an
 * unknown root with `unsupported_dialect`. Individual entries that are not
 * elements, have no identity at all, or break extraction are skipped.
 */
export function parseFeed(
  document: string,
  options: ParseOptions,
  logger: Logger,
): ParseResult {
  const read = readXml(document);
  if (!read.success) {
    return {
      success: false,
      error: new FeedParseError("malformed_document", read.message),
    };
  }

  const { rootName, root } = read.document;
  const dialect = detectDialect(rootName);
  if (dialect === null) {
    return {
      success: false,
      error: new FeedParseError(
        "unsupported_dialect",
        `unsupported root element <${rootName}>`,
      ),
    };
  }

  const reader = DIALECT_READERS[dialect];
  const articles: Array<RawArticle> = [];
  let skipped = 0;

  reader.entries(root).forEach((node, index) => {
    if (!isNode(node)) {
      skipped++;
      logger.debug({ dialect, index }, "skipping entry that is not an element");
      return;
    }

    try {
      const checked = entryFieldsSchema.safeParse(reader.entry(node));
      if (!checked.success) {
        skipped++;
        logger.debug(
          { dialect, index, issues: checked.error.issues.map((i) => i.message) },
          "skipping malformed entry",
        );
        return;
      }
      articles.push(toRawArticle(checked.data, options));
    } catch (err) {
      skipped++;
      const message = err instanceof Error ? err.message : String(err);
      logger.debug({ dialect, index, error: message }, "skipping entry that failed to parse");
    }
  });

  if (skipped > 0) {
    logger.info({ dialect, skipped, kept: articles.length }, "feed entries skipped");
  }

  return {
    success: true,
    feed: {
      dialect,
      title: cleanTitle(reader.title(root)),
      articles,
    },
  };
}
