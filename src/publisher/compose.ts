// pattern: functional-core
import type { FeedEntry, PageMetadata } from "../pipeline/types";
import {
  EXTERNAL_EMBED_TYPE,
  MAX_THUMBNAIL_BYTES,
  POST_COLLECTION,
} from "./types";
import type { ExternalEmbed, PostRecord, UploadedAsset } from "./types";

export type ComposeOptions = {
  readonly textPrefix?: string;
  readonly now?: Date;
};

/**
 * Formats a date as ISO 8601 UTC with microsecond precision,
 * e.g. `2026-10-19T06:30:00.123000Z`.
 */
export function toMicrosecondIso(date: Date): string {
  return date.toISOString().replace(/\.(\d{3})Z$/, ".$1000Z");
}

export function composeRecord(
  entry: FeedEntry,
  metadata: PageMetadata | null,
  uploadedAsset: UploadedAsset | null,
  options: ComposeOptions = {},
): PostRecord {
  const text = `${options.textPrefix ?? ""}${entry.title ?? ""}`;
  const createdAt = toMicrosecondIso(options.now ?? new Date());

  if (!metadata) {
    return { $type: POST_COLLECTION, text, createdAt };
  }

  const thumb =
    uploadedAsset && uploadedAsset.size <= MAX_THUMBNAIL_BYTES
      ? uploadedAsset
      : undefined;

  const embed: ExternalEmbed = {
    $type: EXTERNAL_EMBED_TYPE,
    external: {
      uri: entry.url,
      title: metadata.title ?? entry.title ?? "",
      description: metadata.description ?? "",
      ...(thumb ? { thumb } : {}),
    },
  };

  return { $type: POST_COLLECTION, text, createdAt, embed };
}
