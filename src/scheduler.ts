import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { AppConfig } from "./config";
import { SyncFailedError, errorMessage } from "./errors";
import type { SyncRunner } from "./sync";

export type SyncScheduler = {
  readonly stop: () => void;
  /** Resolves once no sync is in flight. */
  readonly idle: () => Promise<void>;
};

/**
 * Runs one sync and logs its outcome. Resolves to true when every feed synced.
 */
export async function executeSync(runSync: SyncRunner, logger: Logger): Promise<boolean> {
  try {
    const report = await runSync();
    logger.info({ feedCount: report.feeds.length }, "sync succeeded");
    return true;
  } catch (err) {
    if (err instanceof SyncFailedError) {
      logger.error({ failures: err.failures }, "sync finished with failed feeds");
    } else {
      logger.error(
        { error: errorMessage(err), errorName: err instanceof Error ? err.name : "unknown" },
        "sync aborted",
      );
    }
    return false;
  }
}

/**
 * Creates and starts a scheduler that runs a sync on the configured cron schedule.
 * A tick that fires while the previous run is still going is skipped.
 *
 * @param config - Application configuration including schedule.sync cron expression
 * @param runSync - The sync runner to invoke on each tick
 * @param logger - Logger instance for recording scheduler events
 * @returns A SyncScheduler with a stop() method to halt scheduled runs
 */
export function createSyncScheduler(
  config: AppConfig,
  runSync: SyncRunner,
  logger: Logger,
): SyncScheduler {
  let inFlight: Promise<boolean> | null = null;

  const task: ScheduledTask = cron.schedule(config.schedule.sync, async () => {
    if (inFlight) {
      logger.warn("previous sync still running, skipping this tick");
      return;
    }

    logger.info("sync cycle starting");
    inFlight = executeSync(runSync, logger);
    try {
      await inFlight;
    } finally {
      inFlight = null;
    }
  });

  return {
    stop: () => {
      task.stop();
    },
    idle: async () => {
      if (inFlight) await inFlight;
    },
  };
}
