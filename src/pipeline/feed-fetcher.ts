import Parser from "rss-parser";
import type { Logger } from "pino";
import { FeedFetchError, FeedParseError, errorMessage } from "../errors";
import { decodeFeedBody } from "./encoding";
import type { FeedEntry, HttpOptions } from "./types";

type AtomItem = {
  id?: string;
};

export type FeedDocument = Parser.Output<AtomItem>;

let parserInstance: Parser<Record<string, unknown>, AtomItem> | null = null;

export function getParserInstance(): Parser<Record<string, unknown>, AtomItem> {
  if (!parserInstance) {
    parserInstance = new Parser<Record<string, unknown>, AtomItem>();
  }
  return parserInstance;
}

export function setParserInstance(
  parser: Parser<Record<string, unknown>, AtomItem>,
): void {
  parserInstance = parser;
}

export function resetParser(): void {
  parserInstance = null;
}

/**
 * Downloads a feed document, decodes it in its declared charset and hands it
 * to rss-parser.
 * Network and HTTP status failures raise {@link FeedFetchError}; a body the
 * parser rejects raises {@link FeedParseError}. Neither is retried.
 */
export async function fetchFeed(
  url: string,
  options: HttpOptions,
  logger: Logger,
): Promise<FeedDocument> {
  let body: string;
  try {
    const response = await fetch(url, {
      signal: AbortSignal.timeout(options.timeoutMs),
      headers: {
        "User-Agent": options.userAgent,
        Accept:
          "application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8",
      },
    });

    if (!response.ok) {
      throw new FeedFetchError(
        `HTTP ${response.status}: ${response.statusText}`,
        url,
      );
    }

    body = decodeFeedBody(
      new Uint8Array(await response.arrayBuffer()),
      response.headers.get("content-type"),
    );
  } catch (err) {
    if (err instanceof FeedFetchError) throw err;
    throw new FeedFetchError(errorMessage(err), url);
  }

  try {
    const feed = await getParserInstance().parseString(body);
    logger.debug({ feedUrl: url, itemCount: feed.items.length }, "feed parsed");
    return feed;
  } catch (err) {
    throw new FeedParseError(errorMessage(err), url);
  }
}

/**
 * Maps parsed items to entries in document order. Items without a link are
 * dropped because a post cannot embed them.
 */
export function extractEntries(feed: FeedDocument): Array<FeedEntry> {
  const entries: Array<FeedEntry> = [];

  for (const item of feed.items) {
    const url = item.link?.trim();
    if (!url) continue;

    const publishedAt = item.isoDate ? new Date(item.isoDate) : null;

    entries.push({
      id: item.guid ?? item.id ?? url,
      url,
      title: item.title ?? null,
      publishedAt:
        publishedAt && !Number.isNaN(publishedAt.getTime()) ? publishedAt : null,
    });
  }

  return entries;
}
