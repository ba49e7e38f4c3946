import { describe, it, expect, beforeEach, vi } from "vitest";
import { createTestCaller, createTestDatabase, seedTestFeed } from "../../test-utils/db";
import type { AppDatabase } from "../../db";
import type { FetchFeedFn } from "../../pipeline/types";

const RSS = `<rss><channel><title>Remote</title>
  <item><guid>r-1</guid><title>Remote item</title></item>
</channel></rss>`;

describe("sync router", () => {
  let db: AppDatabase;

  beforeEach(() => {
    db = createTestDatabase();
  });

  it("should sync one feed through the context engine", async () => {
    const fetchDocument = vi.fn<FetchFeedFn>(async (url) => ({
      success: true,
      url,
      status: 200,
      contentType: "application/rss+xml",
      body: RSS,
    }));
    const caller = createTestCaller(db, { fetchDocument });
    const feedId = seedTestFeed(db, { url: "https://example.com/rss" });

    expect(await caller.sync.one({ id: feedId })).toEqual({
      feedId,
      status: "done",
      articlesAdded: 1,
      articlesUpdated: 0,
      error: null,
    });
    expect(await caller.sync.status({ id: feedId })).toEqual({ syncing: false });
  });

  it("should report per-feed failures from a full pass", async () => {
    const caller = createTestCaller(db);
    const feedId = seedTestFeed(db);

    const results = await caller.sync.all();

    expect(results).toEqual([
      {
        feedId,
        status: "failed",
        articlesAdded: 0,
        articlesUpdated: 0,
        error: { stage: "fetching", code: "network", message: "offline" },
      },
    ]);
  });

  it("should answer NOT_FOUND for an unknown feed", async () => {
    const caller = createTestCaller(db);

    await expect(caller.sync.one({ id: 9999 })).rejects.toMatchObject({ code: "NOT_FOUND" });
  });
});
