import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { FeedFetchError } from "../errors";
import {
  FEED_ACCEPT,
  classifyFetchFailure,
  decodeBody,
  fetchFeed,
  isRetryable,
} from "./fetcher";
import type { FetchOptions } from "./types";

const logger = pino({ level: "silent" });

const options: FetchOptions = {
  timeoutMs: 50,
  retries: 1,
  retryDelayMs: 0,
  userAgent: "Feedkeeper-Test/1.0",
};

function refused(): TypeError {
  const cause = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:80"), {
    code: "ECONNREFUSED",
  });
  return new TypeError("fetch failed", { cause });
}

describe("fetchFeed", () => {
  it("should return the decoded body on 200", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response("<rss/>", {
        status: 200,
        headers: { "content-type": "application/rss+xml; charset=utf-8" },
      }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await fetchFeed("https://example.com/feed.xml", options, logger);

    expect(result).toEqual({
      success: true,
      url: "https://example.com/feed.xml",
      status: 200,
      contentType: "application/rss+xml; charset=utf-8",
      body: "<rss/>",
    });
  });

  it("should send the configured user agent and feed accept header", async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response("<rss/>"));
    vi.stubGlobal("fetch", fetchMock);

    await fetchFeed("https://example.com/feed.xml", options, logger);

    expect(fetchMock).toHaveBeenCalledWith(
      "https://example.com/feed.xml",
      expect.objectContaining({
        redirect: "follow",
        headers: { "User-Agent": "Feedkeeper-Test/1.0", Accept: FEED_ACCEPT },
      }),
    );
  });

  it("should use the accept override when given", async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response("<html></html>"));
    vi.stubGlobal("fetch", fetchMock);

    await fetchFeed("https://example.com/post", { ...options, accept: "text/html" }, logger);

    expect(fetchMock).toHaveBeenCalledWith(
      "https://example.com/post",
      expect.objectContaining({
        headers: { "User-Agent": "Feedkeeper-Test/1.0", Accept: "text/html" },
      }),
    );
  });

  it("should fail with http_status on 404 without retrying", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValue(new Response("gone", { status: 404, statusText: "Not Found" }));
    vi.stubGlobal("fetch", fetchMock);

    const result = await fetchFeed("https://example.com/missing.xml", options, logger);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("http_status");
      expect(result.error.status).toBe(404);
      expect(result.error.message).toBe("HTTP 404 Not Found");
    }
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should retry a 503 and return the later success", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response("busy", { status: 503 }))
      .mockResolvedValueOnce(new Response("<feed/>", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const result = await fetchFeed("https://example.com/atom.xml", options, logger);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.body).toBe("<feed/>");
    }
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("should give up after the configured retries on repeated timeouts", async () => {
    const fetchMock = vi
      .fn()
      .mockRejectedValue(Object.assign(new Error("aborted"), { name: "TimeoutError" }));
    vi.stubGlobal("fetch", fetchMock);

    const result = await fetchFeed("https://slow.example.com/feed", { ...options, retries: 2 }, logger);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("timeout");
      expect(result.error.message).toBe("request timed out after 50ms");
    }
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("should not retry a refused connection", async () => {
    const fetchMock = vi.fn().mockRejectedValue(refused());
    vi.stubGlobal("fetch", fetchMock);

    const result = await fetchFeed("http://localhost/feed", options, logger);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe("connection_refused");
      expect(result.error.message).toBe("fetch failed (ECONNREFUSED)");
    }
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("classifyFetchFailure", () => {
  it("should map a TLS certificate failure to tls_error", () => {
    const err = new TypeError("fetch failed", {
      cause: Object.assign(new Error("certificate has expired"), { code: "CERT_HAS_EXPIRED" }),
    });

    const classified = classifyFetchFailure(err, 1000);

    expect(classified.code).toBe("tls_error");
    expect(classified.message).toBe("fetch failed (CERT_HAS_EXPIRED)");
  });

  it("should map an undici connect timeout to timeout", () => {
    const err = new TypeError("fetch failed", {
      cause: Object.assign(new Error("Connect Timeout Error"), {
        code: "UND_ERR_CONNECT_TIMEOUT",
      }),
    });

    expect(classifyFetchFailure(err, 1000).code).toBe("timeout");
  });

  it("should map anything else to network", () => {
    const classified = classifyFetchFailure(new Error("socket hang up"), 1000);

    expect(classified.code).toBe("network");
    expect(classified.message).toBe("socket hang up");
  });
});

describe("isRetryable", () => {
  it("should retry timeouts, network errors and server errors only", () => {
    expect(isRetryable(new FeedFetchError("timeout", "t"))).toBe(true);
    expect(isRetryable(new FeedFetchError("network", "n"))).toBe(true);
    expect(isRetryable(new FeedFetchError("http_status", "HTTP 502", 502))).toBe(true);
    expect(isRetryable(new FeedFetchError("http_status", "HTTP 429", 429))).toBe(false);
    expect(isRetryable(new FeedFetchError("connection_refused", "r"))).toBe(false);
    expect(isRetryable(new FeedFetchError("tls_error", "x"))).toBe(false);
  });
});

describe("decodeBody", () => {
  it("should honour the encoding in the XML declaration", () => {
    const source = '<?xml version="1.0" encoding="ISO-8859-1"?><rss>café</rss>';
    const bytes = new Uint8Array(Buffer.from(source, "latin1"));

    expect(decodeBody(bytes, "application/xml")).toBe(source);
  });

  it("should prefer the charset in the content type", () => {
    const bytes = new TextEncoder().encode("<rss>café</rss>");

    expect(decodeBody(bytes, "text/xml; charset=utf-8")).toBe("<rss>café</rss>");
  });

  it("should fall back to UTF-8 for an unknown label", () => {
    const bytes = new TextEncoder().encode("<rss>naïve</rss>");

    expect(decodeBody(bytes, "text/xml; charset=x-unknown")).toBe("<rss>naïve</rss>");
  });
});
