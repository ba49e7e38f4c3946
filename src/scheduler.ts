import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { SyncEngine } from "./pipeline/sync";

export type SyncScheduler = {
  readonly stop: () => void;
};

/**
 * Runs a full sync pass on the cron expression. A tick that arrives while
 * the previous pass is still running is skipped rather than queued.
 *
 * @param engine - The sync orchestrator
 * @param expression - Cron expression, e.g. `"*\/30 * * * *"`
 * @param logger - Logger for cycle events
 */
export function createSyncScheduler(
  engine: SyncEngine,
  expression: string,
  logger: Logger,
): SyncScheduler {
  let running = false;
  const controller = new AbortController();

  const task: ScheduledTask = cron.schedule(expression, async () => {
    if (running) {
      logger.warn("previous sync pass still running, skipping scheduled pass");
      return;
    }

    running = true;
    logger.info("scheduled sync pass starting");
    try {
      const results = await engine.syncAll({ signal: controller.signal });
      const failed = results.filter((r) => r.status === "failed").length;
      logger.info({ feedCount: results.length, failed }, "scheduled sync pass complete");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "scheduled sync pass failed unexpectedly");
    } finally {
      running = false;
    }
  });

  return {
    stop: () => {
      controller.abort();
      task.stop();
    },
  };
}
