import { describe, it, expect, beforeEach } from "vitest";
import { createTestCaller, createTestDatabase } from "../../test-utils/db";
import type { AppDatabase } from "../../db";

describe("settings router", () => {
  let db: AppDatabase;
  let caller: ReturnType<typeof createTestCaller>;

  beforeEach(() => {
    db = createTestDatabase();
    caller = createTestCaller(db);
  });

  it("should set, get and list settings", async () => {
    expect(await caller.settings.set({ key: "enable_ai_briefing", value: true })).toEqual({
      key: "enable_ai_briefing",
      value: "true",
    });

    expect(await caller.settings.get({ key: "enable_ai_briefing" })).toEqual({
      key: "enable_ai_briefing",
      value: "true",
    });
    expect(await caller.settings.get({ key: "missing" })).toEqual({ key: "missing", value: null });
    expect(await caller.settings.list()).toEqual({ enable_ai_briefing: "true" });
  });

  it("should reject an empty key", async () => {
    await expect(caller.settings.set({ key: "", value: "x" })).rejects.toMatchObject({
      code: "BAD_REQUEST",
    });
  });
});
