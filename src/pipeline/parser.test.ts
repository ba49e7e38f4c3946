import { describe, it, expect } from "vitest";
import pino from "pino";
import { cleanTitle, parseFeed } from "./parser";

const logger = pino({ level: "silent" });
const fetchedAt = new Date("2026-01-10T12:00:00Z");

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:content="http://purl.org/rss/1.0/modules/content/">
  <channel>
    <title>Example &amp; Co</title>
    <link>https://example.com/</link>
    <item>
      <title>First post</title>
      <link>https://example.com/posts/1</link>
      <guid isPermaLink="false">post-1</guid>
      <pubDate>Tue, 06 Jan 2026 10:00:00 GMT</pubDate>
      <description><![CDATA[<p>Short <em>summary</em></p>]]></description>
      <content:encoded><![CDATA[<p>Full body</p><p>Second paragraph</p>]]></content:encoded>
    </item>
    <item>
      <title>Second post</title>
      <guid>https://example.com/posts/2</guid>
      <description>Plain text summary</description>
    </item>
  </channel>
</rss>`;

const ATOM = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title type="text">Atom Example</title>
  <entry>
    <id>urn:uuid:1</id>
    <title type="html">&lt;b&gt;Bold&lt;/b&gt; title</title>
    <link rel="self" href="https://example.com/api/1"/>
    <link rel="alternate" href="/entries/1"/>
    <updated>2026-01-06T09:00:00Z</updated>
    <published>2026-01-05T09:00:00Z</published>
    <summary>Summary text</summary>
    <content type="xhtml"><div xmlns="http://www.w3.org/1999/xhtml"><p>Para one</p><p>Para two</p></div></content>
  </entry>
  <entry>
    <id>urn:uuid:2</id>
    <title>Summary only</title>
    <link href="https://example.com/entries/2"/>
    <updated>2026-01-07T09:00:00Z</updated>
    <summary type="html">&lt;p&gt;Just a summary&lt;/p&gt;</summary>
  </entry>
</feed>`;

const RDF = `<?xml version="1.0"?>
<rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#" xmlns="http://purl.org/rss/1.0/" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel rdf:about="https://example.org/">
    <title>RDF Example</title>
  </channel>
  <item rdf:about="https://example.org/items/1">
    <title>RDF item</title>
    <link>https://example.org/items/1</link>
    <dc:date>2026-01-04T08:30:00Z</dc:date>
    <description>RDF description</description>
  </item>
</rdf:RDF>`;

describe("parseFeed", () => {
  it("should normalize an RSS 2.0 document", () => {
    const result = parseFeed(RSS, { fetchedAt, baseUrl: "https://example.com/feed.xml" }, logger);

    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.feed.dialect).toBe("rss");
    expect(result.feed.title).toBe("Example & Co");
    expect(result.feed.articles).toEqual([
      {
        guid: "post-1",
        link: "https://example.com/posts/1",
        title: "First post",
        publishedAt: new Date("2026-01-06T10:00:00Z"),
        hasPublishedDate: true,
        content: "Full body\n\nSecond paragraph",
      },
      {
        guid: "https://example.com/posts/2",
        link: "https://example.com/posts/2",
        title: "Second post",
        publishedAt: fetchedAt,
        hasPublishedDate: false,
        content: "Plain text summary",
      },
    ]);
  });

  it("should normalize an Atom document", () => {
    const result = parseFeed(ATOM, { fetchedAt, baseUrl: "https://example.com/atom.xml" }, logger);

    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.feed.dialect).toBe("atom");
    expect(result.feed.title).toBe("Atom Example");
    expect(result.feed.articles).toEqual([
      {
        guid: "urn:uuid:1",
        link: "https://example.com/entries/1",
        title: "Bold title",
        publishedAt: new Date("2026-01-05T09:00:00Z"),
        hasPublishedDate: true,
        content: "Para one\n\nPara two",
      },
      {
        guid: "urn:uuid:2",
        link: "https://example.com/entries/2",
        title: "Summary only",
        publishedAt: new Date("2026-01-07T09:00:00Z"),
        hasPublishedDate: true,
        content: "Just a summary",
      },
    ]);
  });

  it("should normalize an RDF document", () => {
    const result = parseFeed(RDF, { fetchedAt }, logger);

    expect(result.success).toBe(true);
    if (!result.success) return;

    expect(result.feed.dialect).toBe("rdf");
    expect(result.feed.title).toBe("RDF Example");
    expect(result.feed.articles).toEqual([
      {
        guid: "https://example.org/items/1",
        link: "https://example.org/items/1",
        title: "RDF item",
        publishedAt: new Date("2026-01-04T08:30:00Z"),
        hasPublishedDate: true,
        content: "RDF description",
      },
    ]);
  });

  it("should reject a document that is not well-formed", () => {
    const result = parseFeed("<rss><channel></rss>", { fetchedAt }, logger);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("malformed_document");
    }
  });

  it("should reject an empty document", () => {
    const result = parseFeed("   ", { fetchedAt }, logger);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("malformed_document");
      expect(result.error.message).toBe("document is empty");
    }
  });

  it("should reject an unknown root element", () => {
    const result = parseFeed("<html><body></body></html>", { fetchedAt }, logger);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("unsupported_dialect");
      expect(result.error.message).toBe("unsupported root element <html>");
    }
  });

  it("should skip entries without identity and keep the rest", () => {
    const document = `<rss><channel><title>Mixed</title>
      <item><title>Kept</title><guid>kept-1</guid></item>
      <item><description>orphan text</description></item>
      <item></item>
    </channel></rss>`;

    const result = parseFeed(document, { fetchedAt }, logger);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.feed.articles).toHaveLength(1);
      expect(result.feed.articles[0]!.guid).toBe("kept-1");
    }
  });

  it("should default the title and drop links that are not http(s)", () => {
    const document = `<rss><channel>
      <item><guid>a</guid><link>javascript:alert(1)</link></item>
    </channel></rss>`;

    const result = parseFeed(document, { fetchedAt }, logger);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.feed.title).toBeNull();
      expect(result.feed.articles[0]).toMatchObject({ guid: "a", link: null, title: "Untitled" });
    }
  });

  it("should read items placed beside the channel", () => {
    const document = `<rss version="0.91"><channel><title>Old</title></channel>
      <item><title>Loose item</title><link>https://example.com/loose</link></item>
    </rss>`;

    const result = parseFeed(document, { fetchedAt }, logger);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.feed.articles.map((a) => a.link)).toEqual(["https://example.com/loose"]);
    }
  });

  it("should return an empty article list for a feed with no entries", () => {
    const result = parseFeed("<feed><title>Quiet</title></feed>", { fetchedAt }, logger);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.feed.title).toBe("Quiet");
      expect(result.feed.articles).toEqual([]);
    }
  });

  it("should keep angle brackets in plain-text titles", () => {
    const document = `<rss><channel>
      <item><guid>g1</guid><title>Using Vec&lt;T&gt; in Rust</title></item>
      <item><guid>g2</guid><title>a &lt; b</title></item>
    </channel></rss>`;

    const result = parseFeed(document, { fetchedAt }, logger);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.feed.articles.map((a) => a.title)).toEqual([
        "Using Vec<T> in Rust",
        "a < b",
      ]);
    }
  });

  it("should strip inline tags from a title without losing stray brackets", () => {
    const document = `<rss><channel>
      <item><guid>g1</guid><title>It&#8217;s a &lt;b&gt;bold&lt;/b&gt; x&lt;y</title></item>
    </channel></rss>`;

    const result = parseFeed(document, { fetchedAt }, logger);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.feed.articles[0]!.title).toBe("It\u2019s a bold x<y");
    }
  });

  it("should treat an unparseable date as undated", () => {
    const document = `<rss><channel>
      <item><guid>g1</guid><title>Numbered</title><pubDate>1</pubDate></item>
    </channel></rss>`;

    const result = parseFeed(document, { fetchedAt }, logger);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.feed.articles[0]).toMatchObject({
        publishedAt: fetchedAt,
        hasPublishedDate: false,
      });
    }
  });
});

describe("cleanTitle", () => {
  it("should strip any markup from a title declared HTML", () => {
    expect(cleanTitle({ text: "<p>Para</p> & more", html: true })).toBe("Para & more");
  });

  it("should leave generic type parameters alone in undeclared titles", () => {
    expect(cleanTitle({ text: "Map<a, b> lookups", html: false })).toBe("Map<a, b> lookups");
  });

  it("should return null for null or blank titles", () => {
    expect(cleanTitle(null)).toBeNull();
    expect(cleanTitle({ text: "   ", html: false })).toBeNull();
  });
});
