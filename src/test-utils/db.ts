import { createDatabase, applyMigrations } from "../db";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import { subscriptions } from "../db/schema";

/**
 * Creates an in-memory SQLite test database with all migrations applied.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  applyMigrations(db, "./drizzle");
  return db;
}

/**
 * Seeds a subscription row with optional field overrides.
 * @returns The ID of the inserted row.
 */
export function seedTestSubscription(
  db: AppDatabase,
  overrides?: Partial<typeof subscriptions.$inferInsert>,
): number {
  const result = db
    .insert(subscriptions)
    .values({
      url: "https://example.com/feed.xml",
      ...overrides,
    })
    .returning({ id: subscriptions.id })
    .get();

  return result.id;
}

/**
 * Creates a default AppConfig suitable for testing.
 */
export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    publisher: { serviceUrl: "https://pds.example.test" },
    feeds: [{ url: "https://example.com/feed.xml" }],
    schedule: { sync: "*/15 * * * *" },
    http: { timeoutMs: 5000, userAgent: "feedcaster-test/1.0" },
    post: { textPrefix: "" },
    ...overrides,
  };
}
