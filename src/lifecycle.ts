// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Anything with a synchronous stop, such as a scheduler.
 */
export type Stoppable = {
  readonly stop: () => void;
};

export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  /** Stops accepting API connections; resolves once the listener is closed. */
  readonly closeServer?: () => Promise<void>;
  readonly closeDb: () => void;
  readonly logger: Logger;
  readonly exit?: (code: number) => void;
};

function logFailure(logger: Logger, step: string, err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  logger.error({ error: message, step }, "shutdown step failed");
}

/**
 * Stops schedulers, then the API listener, then closes the database. Each
 * step runs even if an earlier one fails. A second call is a no-op.
 */
export function createShutdown(deps: ShutdownDeps): (signal: string) => Promise<void> {
  let shuttingDown = false;
  const exit = deps.exit ?? ((code: number) => process.exit(code));

  return async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      try {
        scheduler.stop();
      } catch (err) {
        logFailure(deps.logger, "scheduler", err);
      }
    }

    if (deps.closeServer) {
      try {
        await deps.closeServer();
        deps.logger.info("api server closed");
      } catch (err) {
        logFailure(deps.logger, "server", err);
      }
    }

    try {
      deps.closeDb();
      deps.logger.info("database connection closed");
    } catch (err) {
      logFailure(deps.logger, "database", err);
    }

    deps.logger.info("shutdown complete");
    exit(0);
  };
}

/**
 * Registers SIGTERM and SIGINT handlers that run the shutdown sequence.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  const shutdown = createShutdown(deps);
  const handle = (signal: string) => {
    shutdown(signal).catch((err: unknown) => logFailure(deps.logger, "signal", err));
  };

  process.on("SIGTERM", () => handle("SIGTERM"));
  process.on("SIGINT", () => handle("SIGINT"));
}
