// pattern: functional-core
import { FeedParseError } from "../errors";
import { asArray, attr, firstNode, isNode, localName, readXml } from "../pipeline/xml";
import type { XmlNode } from "../pipeline/xml";
import type { FeedSpec } from "./types";

function outlineLabel(outline: XmlNode): string | null {
  return attr(outline, "text") ?? attr(outline, "title");
}

function collect(
  node: XmlNode,
  category: string | null,
  specs: Array<FeedSpec>,
): void {
  for (const outline of asArray(node["outline"])) {
    if (!isNode(outline)) continue;

    const url = attr(outline, "xmlUrl");
    if (url !== null) {
      specs.push({ url, categoryName: category, title: outlineLabel(outline) });
      continue;
    }

    // An outline without xmlUrl is a folder; its label becomes the category
    collect(outline, outlineLabel(outline) ?? category, specs);
  }
}

/**
 * Reads the subscriptions of an OPML document in document order. A feed's
 * category is the label of its nearest enclosing folder outline; top-level
 * feeds are uncategorized.
 *
 * @throws FeedParseError when the document is not well-formed OPML
 */
export function readOpml(document: string): Array<FeedSpec> {
  const read = readXml(document);
  if (!read.success) {
    throw new FeedParseError("malformed_document", read.message);
  }
  if (localName(read.document.rootName) !== "opml") {
    throw new FeedParseError(
      "unsupported_dialect",
      `expected <opml> root, found <${read.document.rootName}>`,
    );
  }

  const body = firstNode(read.document.root["body"]) ?? read.document.root;
  const specs: Array<FeedSpec> = [];
  collect(body, null, specs);
  return specs;
}
