/**
 * Error taxonomy for a sync run.
 *
 * Feed-scoped errors stop the current feed only. {@link AuthError} stops the
 * whole run since nothing can be published without a session.
 */

export type SyncErrorCode =
  | "STORE_UNAVAILABLE"
  | "FEED_FETCH_FAILED"
  | "FEED_PARSE_FAILED"
  | "THUMBNAIL_DOWNLOAD_FAILED"
  | "AUTH_FAILED"
  | "PUBLISH_FAILED"
  | "SYNC_FAILED";

export class SyncError extends Error {
  constructor(
    message: string,
    public readonly code: SyncErrorCode,
  ) {
    super(message);
    this.name = "SyncError";
  }
}

export class StoreUnavailableError extends SyncError {
  constructor(message: string) {
    super(message, "STORE_UNAVAILABLE");
    this.name = "StoreUnavailableError";
  }
}

export class FeedFetchError extends SyncError {
  constructor(
    message: string,
    public readonly feedUrl: string,
  ) {
    super(message, "FEED_FETCH_FAILED");
    this.name = "FeedFetchError";
  }
}

export class FeedParseError extends SyncError {
  constructor(
    message: string,
    public readonly feedUrl: string,
  ) {
    super(message, "FEED_PARSE_FAILED");
    this.name = "FeedParseError";
  }
}

export class ThumbnailDownloadError extends SyncError {
  constructor(
    message: string,
    public readonly imageUrl: string,
  ) {
    super(message, "THUMBNAIL_DOWNLOAD_FAILED");
    this.name = "ThumbnailDownloadError";
  }
}

export class AuthError extends SyncError {
  constructor(message: string) {
    super(message, "AUTH_FAILED");
    this.name = "AuthError";
  }
}

export class PublishError extends SyncError {
  constructor(
    message: string,
    public readonly status: number | null = null,
  ) {
    super(message, "PUBLISH_FAILED");
    this.name = "PublishError";
  }
}

export type FeedFailure = {
  readonly feedUrl: string;
  readonly error: string;
};

/**
 * Raised after every feed has been attempted when at least one of them failed.
 * Cursor advances made before the failure stay committed.
 */
export class SyncFailedError extends SyncError {
  constructor(public readonly failures: ReadonlyArray<FeedFailure>) {
    super(
      `${failures.length} feed${failures.length === 1 ? "" : "s"} failed to sync: ${failures
        .map((f) => f.feedUrl)
        .join(", ")}`,
      "SYNC_FAILED",
    );
    this.name = "SyncFailedError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
