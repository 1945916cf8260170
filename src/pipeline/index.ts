export { fetchFeed, extractEntries } from "./feed-fetcher";
export { extractMetadata, parseOgMetadata } from "./metadata";
export { fetchAndResize, loadThumbnail, resizeImage, THUMBNAIL_MAX_EDGE_PX } from "./thumbnail";
export type { FeedDocument } from "./feed-fetcher";
export type { FeedEntry, HttpOptions, ImageAsset, PageMetadata } from "./types";
