import { resolve } from "node:path";
import type { Server } from "node:http";
import { createLogger } from "./logger";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createDatabase, migrateDatabase } from "./db";
import { seedDatabase } from "./seed";
import { createSyncEngine, fetchFeed } from "./pipeline";
import { createSyncScheduler } from "./scheduler";
import { createApiServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";
import type { Stoppable } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";
const DATABASE_URL = process.env["DATABASE_URL"] ?? "./data/feedkeeper.db";
const HOST = process.env["HOST"] ?? "127.0.0.1";
const PORT = parseInt(process.env["PORT"] ?? "3000", 10);

async function main(): Promise<void> {
  const logger = createLogger(process.env["LOG_LEVEL"]);

  logger.info("feedkeeper starting");

  let config: AppConfig;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    { feedCount: config.feeds.length, maxConcurrency: config.sync.maxConcurrency },
    "config loaded",
  );

  const { db, close: closeDb } = createDatabase(resolve(DATABASE_URL));

  migrateDatabase(db, resolve("./drizzle"));
  logger.info("database migrations applied");

  seedDatabase(db, config, logger);

  const engine = createSyncEngine({ db, config: config.sync, logger });

  const schedulers: Array<Stoppable> = [];
  if (config.schedule.sync) {
    schedulers.push(createSyncScheduler(engine, config.schedule.sync, logger));
    logger.info({ schedule: config.schedule.sync }, "sync scheduler started");
  } else {
    logger.info("no sync schedule configured, syncing on request only");
  }

  const app = createApiServer({ db, config, logger, engine, fetchDocument: fetchFeed });
  const server: Server = app.listen(PORT, HOST, () => {
    logger.info({ host: HOST, port: PORT }, "api server listening");
  });

  registerShutdownHandlers({
    schedulers,
    closeServer: () =>
      new Promise<void>((done, fail) => {
        server.close((err) => (err ? fail(err) : done()));
      }),
    closeDb,
    logger,
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
