// pattern: Imperative Shell
import { z } from "zod";
import type { AppDatabase } from "../db";
import { subscriptions } from "../db/schema";
import { StoreUnavailableError, errorMessage } from "../errors";

export type Subscription = {
  readonly url: string;
  readonly lastPostedEntryId: string | null;
};

/**
 * Per-feed cursor persistence. Every call is a suspension point so the
 * orchestrator does not depend on the backing store being synchronous.
 */
export type CursorStore = {
  readonly listSubscriptions: () => Promise<ReadonlyArray<Subscription>>;
  readonly advanceCursor: (url: string, entryId: string) => Promise<void>;
};

const subscriptionRecordSchema = z.object({
  url: z.string().min(1),
  lastPostedEntryId: z.string().nullable(),
});

export function createSqliteCursorStore(db: AppDatabase): CursorStore {
  return {
    async listSubscriptions() {
      let rows: Array<{ url: unknown; lastPostedEntryId: unknown }>;
      try {
        rows = db
          .select({
            url: subscriptions.url,
            lastPostedEntryId: subscriptions.lastPostedEntryId,
          })
          .from(subscriptions)
          .orderBy(subscriptions.id)
          .all();
      } catch (err) {
        throw new StoreUnavailableError(
          `failed to read subscriptions: ${errorMessage(err)}`,
        );
      }

      return rows.map((row, index) => {
        const result = subscriptionRecordSchema.safeParse(row);
        if (!result.success) {
          const issues = result.error.issues
            .map((i) => `${i.path.join(".")}: ${i.message}`)
            .join("; ");
          throw new StoreUnavailableError(
            `malformed subscription record at position ${index}: ${issues}`,
          );
        }
        return result.data;
      });
    },

    async advanceCursor(url, entryId) {
      try {
        db.insert(subscriptions)
          .values({ url, lastPostedEntryId: entryId, updatedAt: new Date() })
          .onConflictDoUpdate({
            target: subscriptions.url,
            set: { lastPostedEntryId: entryId, updatedAt: new Date() },
          })
          .run();
      } catch (err) {
        throw new StoreUnavailableError(
          `failed to advance cursor for ${url}: ${errorMessage(err)}`,
        );
      }
    },
  };
}
