import { describe, it, expect } from "vitest";
import { FeedParseError } from "../errors";
import { readOpml } from "./opml";

const OPML = `<?xml version="1.0" encoding="UTF-8"?>
<opml version="2.0">
  <head><title>Subscriptions</title></head>
  <body>
    <outline text="Top level" type="rss" xmlUrl="https://top.example.com/feed"/>
    <outline text="Tech" title="Tech">
      <outline text="Site &amp; Blog" type="rss" xmlUrl="https://tech.example.com/rss" htmlUrl="https://tech.example.com/"/>
      <outline title="Titled only" type="rss" xmlUrl="https://titled.example.com/atom"/>
      <outline text="Deep">
        <outline xmlUrl="https://deep.example.com/feed"/>
      </outline>
    </outline>
  </body>
</opml>`;

describe("readOpml", () => {
  it("should read feeds with the label of their enclosing folder", () => {
    expect(readOpml(OPML)).toEqual([
      { url: "https://top.example.com/feed", categoryName: null, title: "Top level" },
      { url: "https://tech.example.com/rss", categoryName: "Tech", title: "Site & Blog" },
      { url: "https://titled.example.com/atom", categoryName: "Tech", title: "Titled only" },
      { url: "https://deep.example.com/feed", categoryName: "Deep", title: null },
    ]);
  });

  it("should return nothing for an empty body", () => {
    expect(readOpml('<opml version="2.0"><body></body></opml>')).toEqual([]);
  });

  it("should reject a document that is not well-formed", () => {
    expect(() => readOpml("<opml><body>")).toThrow(FeedParseError);
  });

  it("should reject a document whose root is not opml", () => {
    expect(() => readOpml("<rss><channel/></rss>")).toThrow("expected <opml> root, found <rss>");
  });
});
