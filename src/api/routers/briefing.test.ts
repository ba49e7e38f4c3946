import { describe, it, expect, beforeEach } from "vitest";
import {
  createTestCaller,
  createTestDatabase,
  seedTestArticle,
  seedTestFeed,
} from "../../test-utils/db";
import type { AppDatabase } from "../../db";
import { setSetting } from "../../store/settings";
import { BRIEFING_INSTRUCTIONS } from "../../briefing/builder";
import { BRIEFING_SETTING } from "./briefing";

describe("briefing router", () => {
  let db: AppDatabase;
  let caller: ReturnType<typeof createTestCaller>;
  const since = new Date("2026-01-06T00:00:00Z");

  beforeEach(() => {
    db = createTestDatabase();
    caller = createTestCaller(db);
    const feedId = seedTestFeed(db, { title: "Wire" });
    seedTestArticle(db, feedId, {
      title: "Headline",
      content: "Body",
      publishedAt: new Date("2026-01-06T07:00:00Z"),
    });
  });

  it("should stay disabled until the setting is on", async () => {
    expect(await caller.briefing.input({ since })).toEqual({ enabled: false });
  });

  it("should return the summarizer input once enabled", async () => {
    setSetting(db, BRIEFING_SETTING, true);

    expect(await caller.briefing.input({ since })).toEqual({
      enabled: true,
      instructions: BRIEFING_INSTRUCTIONS,
      articleText: "Title: Headline\nSource: Wire\nContent: Body\n---\n",
      articleCount: 1,
    });
  });
});
