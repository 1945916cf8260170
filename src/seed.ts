import type { Logger } from "pino";
import type { AppDatabase } from "./db";
import type { AppConfig } from "./config";
import { subscriptions } from "./db/schema";

/**
 * Registers the feeds listed in the config file as subscriptions.
 *
 * Idempotent: a feed already in the store keeps its row and cursor, and feeds
 * removed from the config are not deleted. Returns the number of new rows.
 */
export function seedSubscriptions(
  db: AppDatabase,
  config: AppConfig,
  logger: Logger,
): number {
  let inserted = 0;

  for (const feed of config.feeds) {
    const result = db
      .insert(subscriptions)
      .values({ url: feed.url })
      .onConflictDoNothing({ target: subscriptions.url })
      .run();
    inserted += result.changes;
  }

  logger.info(
    { configured: config.feeds.length, inserted },
    "subscriptions seeded from config",
  );
  return inserted;
}
