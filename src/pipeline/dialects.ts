// pattern: functional-core
import type { FeedDialect } from "./types";
import {
  asArray,
  attr,
  child,
  firstNode,
  flattenText,
  isNode,
  localName,
  text,
} from "./xml";
import type { XmlNode } from "./xml";

/**
 * Fields of one entry as the document states them, before dates are
 * parsed and HTML is flattened. `contentHtml` is HTML for every dialect.
 */
export type EntryFields = {
  readonly guid: string | null;
  readonly link: string | null;
  readonly title: TitleText | null;
  readonly date: string | null;
  readonly contentHtml: string | null;
};

/** A title as written; `html` is set when the document declares it HTML. */
export type TitleText = {
  readonly text: string;
  readonly html: boolean;
};

export type DialectReader = {
  readonly title: (root: XmlNode) => TitleText | null;
  readonly entries: (root: XmlNode) => ReadonlyArray<unknown>;
  readonly entry: (node: XmlNode) => EntryFields;
};

/**
 * Picks the dialect from the root element name alone.
 */
export function detectDialect(rootName: string): FeedDialect | null {
  switch (localName(rootName)) {
    case "rss":
      return "rss";
    case "feed":
      return "atom";
    case "RDF":
      return "rdf";
    default:
      return null;
  }
}

function titleText(value: unknown): TitleText | null {
  const node = firstNode(value);
  const type = node === null ? null : attr(node, "type");
  if (node !== null && type === "xhtml") {
    const flattened = flattenText(node);
    return flattened.length > 0 ? { text: flattened, html: false } : null;
  }
  const raw = text(value);
  return raw === null ? null : { text: raw, html: type === "html" };
}

function looksLikeUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

const rssReader: DialectReader = {
  title: (root) => titleText(child(firstNode(root["channel"]) ?? {}, "title")),

  // RSS 0.9x feeds occasionally put items beside the channel
  entries: (root) => [
    ...asArray(child(firstNode(root["channel"]) ?? {}, "item")),
    ...asArray(root["item"]),
  ],

  entry: (node) => {
    const guidNode = firstNode(node["guid"]);
    const guid = text(node["guid"]);
    const permalink =
      guid !== null && guidNode !== null
        ? attr(guidNode, "isPermaLink") !== "false"
        : guid !== null;

    let link = text(node["link"]);
    if (link === null && guid !== null && permalink && looksLikeUrl(guid)) {
      link = guid;
    }

    return {
      guid,
      link,
      title: titleText(node["title"]),
      date: text(node["pubDate"]) ?? text(node["dc:date"]),
      contentHtml: text(node["content:encoded"]) ?? text(node["description"]),
    };
  },
};

function atomLink(value: unknown): string | null {
  const links = asArray(value).filter(isNode);
  const alternate = links.find((link) => {
    const rel = attr(link, "rel");
    return (rel === null || rel === "alternate") && attr(link, "href") !== null;
  });
  const chosen = alternate ?? links.find((link) => attr(link, "href") !== null);
  if (chosen) return attr(chosen, "href");
  // Atom 0.3 style `<link>url</link>`
  return text(value);
}

function atomContent(value: unknown): string | null {
  const node = firstNode(value);
  if (node !== null && attr(node, "type") === "xhtml") {
    const flattened = flattenText(node);
    return flattened.length > 0 ? flattened : null;
  }
  return text(value);
}

const atomReader: DialectReader = {
  title: (root) => titleText(root["title"]),

  entries: (root) => asArray(root["entry"]),

  entry: (node) => ({
    guid: text(node["id"]),
    link: atomLink(node["link"]),
    title: titleText(node["title"]),
    date:
      text(node["published"]) ??
      text(node["updated"]) ??
      text(node["issued"]) ??
      text(node["modified"]),
    contentHtml: atomContent(node["content"]) ?? atomContent(node["summary"]),
  }),
};

const rdfReader: DialectReader = {
  title: (root) => titleText(child(firstNode(root["channel"]) ?? {}, "title")),

  entries: (root) => asArray(root["item"]),

  entry: (node) => ({
    guid: attr(node, "rdf:about"),
    link: text(node["link"]),
    title: titleText(node["title"]),
    date: text(node["dc:date"]),
    contentHtml: text(node["content:encoded"]) ?? text(node["description"]),
  }),
};

export const DIALECT_READERS: Readonly<Record<FeedDialect, DialectReader>> = {
  rss: rssReader,
  atom: atomReader,
  rdf: rdfReader,
};
