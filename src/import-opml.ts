import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { createLogger } from "./logger";
import { createDatabase, migrateDatabase } from "./db";
import { readOpml, importFeeds } from "./import";

const DATABASE_URL = process.env["DATABASE_URL"] ?? "./data/feedkeeper.db";

/**
 * One-shot subscription import: `import-opml <file.opml>`.
 */
function main(): void {
  const logger = createLogger(process.env["LOG_LEVEL"]);
  const file = process.argv[2];
  if (!file) {
    logger.fatal("usage: import-opml <file.opml>");
    process.exit(2);
  }

  const document = readFileSync(resolve(file), "utf-8");
  const specs = readOpml(document);

  const { db, close } = createDatabase(resolve(DATABASE_URL));
  try {
    migrateDatabase(db, resolve("./drizzle"));
    const report = importFeeds(db, specs, logger);
    for (const item of report.items) {
      if (item.status === "failed") {
        logger.warn({ url: item.url, code: item.error.code }, item.error.message);
      }
    }
  } finally {
    close();
  }
}

try {
  main();
} catch (err) {
  console.error("import failed:", err instanceof Error ? err.message : err);
  process.exit(1);
}
