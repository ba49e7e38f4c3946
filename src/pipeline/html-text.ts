// pattern: functional-core
import * as cheerio from "cheerio";

const DROPPED = "script, style, noscript, iframe, object, embed, svg, form, template";

const BLOCKS = [
  "p",
  "div",
  "section",
  "article",
  "header",
  "footer",
  "aside",
  "blockquote",
  "pre",
  "ul",
  "ol",
  "li",
  "table",
  "tr",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "hr",
  "figure",
  "figcaption",
].join(", ");

/**
 * Collapses runs of spaces inside lines, trims each line and keeps at most
 * one blank line between paragraphs.
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.replace(/[ \t\f\v\u00a0]+/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Renders an HTML fragment as plain text: active and embedded content is
 * dropped, `<br>` becomes a line break and block elements are separated by
 * a blank line. Entities are decoded.
 */
export function htmlToText(html: string): string {
  if (!html.trim()) return "";

  const $ = cheerio.load(html, null, false);
  $(DROPPED).remove();
  $("br").replaceWith("\n");
  $(BLOCKS).each((_, el) => {
    $(el).before("\n\n");
    $(el).after("\n\n");
  });

  return normalizeWhitespace($.root().text());
}

/**
 * Text of the first selector that yields any, with page chrome removed.
 * Used for on-demand full-text retrieval of an article page.
 */
export function extractReadableText(
  html: string,
  selectors: ReadonlyArray<string>,
): string {
  const $ = cheerio.load(html);
  $("nav, footer, aside, [role=navigation], [aria-hidden=true]").remove();

  for (const selector of selectors) {
    const inner = $(selector)
      .map((_, el) => $(el).html() ?? "")
      .get()
      .join("\n");
    const text = htmlToText(inner);
    if (text.length > 0) return text;
  }
  return "";
}
