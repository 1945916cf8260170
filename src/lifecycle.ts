// pattern: Imperative Shell
import type { Logger } from "pino";
import { errorMessage } from "./errors";
import type { SyncScheduler } from "./scheduler";

/**
 * Dependencies for the shutdown handler.
 */
export type ShutdownDeps = {
  readonly scheduler: SyncScheduler;
  readonly closeDb: () => void;
  readonly logger: Logger;
};

/**
 * Registers SIGTERM and SIGINT handlers for graceful shutdown.
 *
 * - Repeated signals during shutdown are ignored
 * - Stops the scheduler, then waits for an in-flight sync so its last cursor
 *   write lands before the database closes
 * - Each cleanup step runs even if an earlier one failed
 * - Exits with status 0 once cleanup is done
 *
 * @returns The shutdown function, for callers that want to trigger it directly
 */
export function registerShutdownHandlers(
  deps: ShutdownDeps,
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    try {
      deps.scheduler.stop();
    } catch (err) {
      deps.logger.error({ error: errorMessage(err) }, "error stopping scheduler");
    }

    try {
      await deps.scheduler.idle();
    } catch (err) {
      deps.logger.error({ error: errorMessage(err) }, "error waiting for in-flight sync");
    }

    try {
      deps.closeDb();
      deps.logger.info("database connection closed");
    } catch (err) {
      deps.logger.error({ error: errorMessage(err) }, "error closing database");
    }

    deps.logger.info("shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      deps.logger.fatal({ error: errorMessage(err) }, "shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));

  return shutdown;
}
