// pattern: functional-core
import { createHash } from "node:crypto";
import { utcDay } from "./dates";
import type { RawArticle } from "./types";

function sha256(value: string): string {
  return createHash("sha256").update(value, "utf8").digest("hex");
}

/**
 * Lowercases scheme and host, drops the fragment, `utm_*` tracking
 * parameters and a trailing path slash. Strings that are not absolute URLs
 * are only trimmed and lowercased.
 */
export function normalizeLink(link: string): string {
  const trimmed = link.trim();
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return trimmed.toLowerCase();
  }

  url.hash = "";
  for (const name of [...url.searchParams.keys()]) {
    if (name.toLowerCase().startsWith("utm_")) url.searchParams.delete(name);
  }
  if (url.pathname.length > 1 && url.pathname.endsWith("/")) {
    url.pathname = url.pathname.replace(/\/+$/, "");
  }
  // URL already lowercases scheme and host
  return url.toString();
}

export function normalizeTitle(title: string): string {
  return title.normalize("NFKC").toLowerCase().replace(/\s+/g, " ").trim();
}

/**
 * Per-feed identity of an article: the feed's guid, else a hash of the
 * normalized link, else a hash of the normalized title and the publication
 * day. Best effort: feeds that reuse a link or a title on the same day
 * collapse into one article, and a retitled guid-less, link-less entry
 * becomes a new one.
 */
export function canonicalKey(article: RawArticle): string {
  const guid = article.guid?.trim();
  if (guid) return `guid:${guid}`;

  const link = article.link?.trim();
  if (link) return `link:${sha256(normalizeLink(link))}`;

  const day = article.hasPublishedDate ? utcDay(article.publishedAt) : "";
  return `title:${sha256(`${normalizeTitle(article.title)}|${day}`)}`;
}
