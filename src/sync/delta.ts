// pattern: functional-core
import type { FeedEntry } from "../pipeline/types";

/**
 * Orders entries newest first by publish date when every entry carries one.
 * Otherwise the document order is kept, since feeds list newest first by
 * convention. The sort is stable, so entries sharing a date keep their order.
 */
export function orderNewestFirst(entries: ReadonlyArray<FeedEntry>): Array<FeedEntry> {
  const dated = entries.flatMap((entry) =>
    entry.publishedAt ? [{ entry, time: entry.publishedAt.getTime() }] : [],
  );
  if (dated.length !== entries.length) return [...entries];

  return dated.sort((a, b) => b.time - a.time).map((d) => d.entry);
}

/**
 * Computes the entries still to publish, oldest first.
 *
 * Without a cursor only the newest entry is returned so a new subscription
 * does not backfill the whole feed. With a cursor, entries newer than it are
 * collected; if it is no longer in the document, everything fetched counts
 * as new.
 */
export function computeDelta(
  entries: ReadonlyArray<FeedEntry>,
  cursor: string | null,
): Array<FeedEntry> {
  const ordered = orderNewestFirst(entries);

  if (cursor === null) {
    const newest = ordered[0];
    return newest ? [newest] : [];
  }

  const collected: Array<FeedEntry> = [];
  const seen = new Set<string>();

  for (const entry of ordered) {
    if (entry.id === cursor) break;
    if (seen.has(entry.id)) continue;
    seen.add(entry.id);
    collected.push(entry);
  }

  return collected.reverse();
}
