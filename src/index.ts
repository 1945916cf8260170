import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig, parseCredentials } from "./config";
import { applyMigrations, createDatabase } from "./db";
import { seedSubscriptions } from "./seed";
import { createSqliteCursorStore } from "./store/cursor-store";
import { createSyncRunner } from "./sync";
import { createSyncScheduler, executeSync } from "./scheduler";
import { registerShutdownHandlers } from "./lifecycle";
import { errorMessage } from "./errors";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";
const DATABASE_URL = process.env["DATABASE_URL"] ?? "./data/feedcaster.db";
const RUN_ONCE = process.env["RUN_ONCE"] === "true";

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info({ runOnce: RUN_ONCE }, "feedcaster starting");

  let config;
  let credentials;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
    credentials = parseCredentials(process.env);
  } catch (err) {
    logger.fatal({ error: errorMessage(err) }, "configuration error");
    process.exit(1);
  }

  logger.info(
    { serviceUrl: config.publisher.serviceUrl, schedule: config.schedule.sync },
    "config loaded",
  );

  const { db, close: closeDb } = createDatabase(resolve(DATABASE_URL));

  applyMigrations(db, resolve(__dirname, "../drizzle"));
  logger.info("database migrations applied");

  seedSubscriptions(db, config, logger);

  const runSync = createSyncRunner({
    store: createSqliteCursorStore(db),
    config,
    credentials,
    logger,
  });

  if (RUN_ONCE) {
    const ok = await executeSync(runSync, logger);
    closeDb();
    process.exit(ok ? 0 : 1);
  }

  const scheduler = createSyncScheduler(config, runSync, logger);
  logger.info({ schedule: config.schedule.sync }, "sync scheduler started");

  registerShutdownHandlers({ scheduler, closeDb, logger });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
