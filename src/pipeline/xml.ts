import { XMLParser, XMLValidator } from "fast-xml-parser";

export type XmlNode = { readonly [key: string]: unknown };

export const ATTR_PREFIX = "@_";
export const TEXT_KEY = "#text";

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  removeNSPrefix: false,
});

export type XmlDocument = {
  readonly rootName: string;
  readonly root: XmlNode;
};

export type XmlReadResult =
  | { readonly success: true; readonly document: XmlDocument }
  | { readonly success: false; readonly message: string };

export function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asArray(value: unknown): ReadonlyArray<unknown> {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

export function child(node: XmlNode, name: string): unknown {
  return node[name];
}

export function firstNode(value: unknown): XmlNode | null {
  const found = asArray(value).find(isNode);
  return found ?? null;
}

/**
 * Text content of an element: a bare string, or the `#text` of an element
 * that also carries attributes. Repeated elements yield the first text.
 * Blank text is null.
 */
export function text(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    for (const item of value) {
      const found = text(item);
      if (found !== null) return found;
    }
    return null;
  }
  if (isNode(value)) {
    return text(value[TEXT_KEY]);
  }
  return null;
}

export function attr(node: XmlNode, name: string): string | null {
  return text(node[`${ATTR_PREFIX}${name}`]);
}

/**
 * All text below an element, children joined by blank lines. Used for
 * inline XHTML content, which the object form no longer keeps in order.
 */
export function flattenText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) {
    return value.map(flattenText).filter((part) => part.length > 0).join("\n\n");
  }
  if (isNode(value)) {
    return Object.entries(value)
      .filter(([key]) => !key.startsWith(ATTR_PREFIX))
      .map(([, inner]) => flattenText(inner))
      .filter((part) => part.length > 0)
      .join("\n\n");
  }
  return "";
}

export function localName(qualified: string): string {
  const colon = qualified.lastIndexOf(":");
  return colon === -1 ? qualified : qualified.slice(colon + 1);
}

/**
 * Checks well-formedness, then parses into the object form. The root is
 * the first element of the document.
 */
export function readXml(source: string): XmlReadResult {
  const trimmed = source.replace(/^\uFEFF/, "").trim();
  if (trimmed.length === 0) {
    return { success: false, message: "document is empty" };
  }

  const validation = XMLValidator.validate(trimmed);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    return { success: false, message: `${msg} (line ${line}, column ${col})` };
  }

  const parsed: unknown = xmlParser.parse(trimmed);
  if (!isNode(parsed)) {
    return { success: false, message: "document has no root element" };
  }

  const rootName = Object.keys(parsed).find(
    (key) => !key.startsWith("?") && !key.startsWith("#"),
  );
  if (rootName === undefined) {
    return { success: false, message: "document has no root element" };
  }

  const rootValue = parsed[rootName];
  // `<rss/>` parses to an empty string rather than an object
  const root: XmlNode = isNode(rootValue) ? rootValue : {};
  return { success: true, document: { rootName, root } };
}
