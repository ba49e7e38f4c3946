import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, parseConfig } from "./index";

describe("parseConfig", () => {
  it("should fill every section with defaults for an empty document", () => {
    expect(parseConfig("")).toEqual({
      sync: {
        maxConcurrency: 8,
        timeoutMs: 10000,
        retries: 1,
        retryDelayMs: 500,
        userAgent: "Feedkeeper/0.1 (+local feed reader)",
      },
      schedule: {},
      fullText: {
        selectors: ["article", "main", "[role=main]", "body"],
        timeoutMs: 15000,
      },
      feeds: [],
    });
  });

  it("should read overrides", () => {
    const config = parseConfig(`
sync:
  maxConcurrency: 2
schedule:
  sync: "*/15 * * * *"
feeds:
  - url: https://example.com/rss
    category: News
`);

    expect(config.sync.maxConcurrency).toBe(2);
    expect(config.sync.retries).toBe(1);
    expect(config.schedule.sync).toBe("*/15 * * * *");
    expect(config.feeds).toEqual([{ url: "https://example.com/rss", category: "News" }]);
  });

  it("should report invalid values with their path", () => {
    expect(() => parseConfig("sync:\n  maxConcurrency: 0\n", "test.yaml")).toThrow(
      /^invalid configuration in test\.yaml:\n {2}- sync\.maxConcurrency: /,
    );
  });

  it("should report YAML syntax errors", () => {
    expect(() => parseConfig("sync: [unclosed", "bad.yaml")).toThrow(
      /^failed to parse YAML in bad\.yaml: /,
    );
  });
});

describe("loadConfig", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("should load and validate a file", () => {
    dir = mkdtempSync(join(tmpdir(), "feedkeeper-config-"));
    const path = join(dir, "config.yaml");
    writeFileSync(path, "sync:\n  retries: 3\n");

    expect(loadConfig(path).sync.retries).toBe(3);
  });

  it("should fail with the path when the file is missing", () => {
    expect(() => loadConfig("/nonexistent/feedkeeper.yaml")).toThrow(
      /^failed to read config file at \/nonexistent\/feedkeeper\.yaml: /,
    );
  });
});
