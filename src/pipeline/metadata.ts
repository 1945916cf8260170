// pattern: functional-core
import * as cheerio from "cheerio";
import type { Logger } from "pino";
import { errorMessage } from "../errors";
import { decodeHtmlBody } from "./encoding";
import type { HttpOptions, PageMetadata } from "./types";

function readOgProperty(
  $: cheerio.CheerioAPI,
  property: string,
): string | null {
  const content = $(`meta[property="${property}"]`).first().attr("content");
  return content ?? null;
}

/**
 * Reads the Open Graph title, description and image tags from a page.
 * Each tag is optional and read independently of the others.
 */
export function parseOgMetadata(html: string): PageMetadata {
  const $ = cheerio.load(html);
  return {
    title: readOgProperty($, "og:title"),
    description: readOgProperty($, "og:description"),
    imageUrl: readOgProperty($, "og:image"),
  };
}

/**
 * Fetches an entry's target page and extracts its Open Graph metadata.
 * Returns null on any failure; enrichment never blocks publishing.
 */
export async function extractMetadata(
  url: string,
  options: HttpOptions,
  logger: Logger,
): Promise<PageMetadata | null> {
  try {
    const response = await fetch(url, {
      signal: AbortSignal.timeout(options.timeoutMs),
      headers: {
        "User-Agent": options.userAgent,
        Accept: "text/html,application/xhtml+xml",
      },
    });

    if (!response.ok) {
      logger.warn(
        { url, status: response.status },
        "metadata page returned non-success status",
      );
      return null;
    }

    const html = decodeHtmlBody(
      new Uint8Array(await response.arrayBuffer()),
      response.headers.get("content-type"),
    );
    return parseOgMetadata(html);
  } catch (err) {
    logger.warn({ url, error: errorMessage(err) }, "metadata extraction failed");
    return null;
  }
}
