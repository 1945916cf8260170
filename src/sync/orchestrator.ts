// pattern: Imperative Shell
import type { Logger } from "pino";
import type { CursorStore, Subscription } from "../store/cursor-store";
import { extractEntries, extractMetadata, fetchFeed, loadThumbnail } from "../pipeline";
import type { FeedEntry, HttpOptions } from "../pipeline";
import { composeRecord } from "../publisher/compose";
import { MAX_THUMBNAIL_BYTES } from "../publisher/types";
import type { PostRecord, PublishResult, UploadedAsset } from "../publisher/types";
import { AuthError, SyncFailedError, errorMessage } from "../errors";
import { computeDelta } from "./delta";

/**
 * The slice of the publish client the orchestrator drives.
 */
export type Publisher = {
  readonly uploadAsset: (bytes: Buffer, contentType: string) => Promise<UploadedAsset>;
  readonly publish: (record: PostRecord) => Promise<PublishResult>;
};

export type SyncDeps = {
  readonly store: CursorStore;
  readonly publisher: Publisher;
  readonly http: HttpOptions;
  readonly textPrefix: string;
  readonly logger: Logger;
};

export type FeedSyncResult = {
  readonly feedUrl: string;
  readonly publishedCount: number;
  readonly error: string | null;
};

export type SyncReport = {
  readonly feeds: ReadonlyArray<FeedSyncResult>;
};

function resolveImageUrl(imageUrl: string, pageUrl: string): string | null {
  try {
    return new URL(imageUrl, pageUrl).toString();
  } catch {
    return null;
  }
}

async function publishEntry(
  feedUrl: string,
  entry: FeedEntry,
  deps: SyncDeps,
): Promise<PublishResult> {
  const { http, logger, publisher } = deps;

  const metadata = await extractMetadata(entry.url, http, logger);
  const imageUrl = metadata?.imageUrl
    ? resolveImageUrl(metadata.imageUrl, entry.url)
    : null;
  const thumbnail = imageUrl ? await loadThumbnail(imageUrl, http, logger) : null;

  const uploaded = thumbnail
    ? await publisher.uploadAsset(thumbnail.bytes, thumbnail.contentType)
    : null;

  if (uploaded && uploaded.size > MAX_THUMBNAIL_BYTES) {
    logger.info(
      { feedUrl, entryId: entry.id, size: uploaded.size },
      "thumbnail exceeds size limit, posting without it",
    );
  }

  const record = composeRecord(entry, metadata, uploaded, {
    textPrefix: deps.textPrefix,
  });
  return publisher.publish(record);
}

/**
 * Publishes one feed's unpublished entries oldest first, advancing the cursor
 * after each confirmed publish. Stops at the first failing entry.
 * {@link AuthError} is rethrown; every other failure is reported in the result.
 */
export async function syncFeed(
  subscription: Subscription,
  deps: SyncDeps,
): Promise<FeedSyncResult> {
  const { logger, store } = deps;
  const feedUrl = subscription.url;
  let publishedCount = 0;

  try {
    const feed = await fetchFeed(feedUrl, deps.http, logger);
    const entries = extractEntries(feed);
    const delta = computeDelta(entries, subscription.lastPostedEntryId);

    logger.info(
      {
        feedUrl,
        entryCount: entries.length,
        deltaCount: delta.length,
        cursor: subscription.lastPostedEntryId,
      },
      "feed delta computed",
    );

    for (const entry of delta) {
      const result = await publishEntry(feedUrl, entry, deps);
      await store.advanceCursor(feedUrl, entry.id);
      publishedCount++;
      logger.info({ feedUrl, entryId: entry.id, uri: result.uri }, "entry published");
    }

    return { feedUrl, publishedCount, error: null };
  } catch (err) {
    if (err instanceof AuthError) throw err;

    const message = errorMessage(err);
    logger.error(
      {
        feedUrl,
        publishedCount,
        error: message,
        errorName: err instanceof Error ? err.name : "unknown",
      },
      "feed sync failed",
    );
    return { feedUrl, publishedCount, error: message };
  }
}

/**
 * Runs one sync pass over every subscription, one feed at a time.
 *
 * - A failing feed does not stop the others
 * - AuthError aborts the run at once
 * - If any feed failed, throws SyncFailedError after all feeds were attempted
 */
export async function runSync(deps: SyncDeps): Promise<SyncReport> {
  const subscriptions = await deps.store.listSubscriptions();
  deps.logger.info({ feedCount: subscriptions.length }, "sync run starting");

  const feeds: Array<FeedSyncResult> = [];
  for (const subscription of subscriptions) {
    feeds.push(await syncFeed(subscription, deps));
  }

  const failures = feeds.flatMap((f) =>
    f.error === null ? [] : [{ feedUrl: f.feedUrl, error: f.error }],
  );

  deps.logger.info(
    {
      feedCount: feeds.length,
      failedCount: failures.length,
      publishedCount: feeds.reduce((sum, f) => sum + f.publishedCount, 0),
    },
    "sync run complete",
  );

  if (failures.length > 0) {
    throw new SyncFailedError(failures);
  }

  return { feeds };
}
