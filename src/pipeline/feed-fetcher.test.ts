import { describe, it, expect, afterEach, vi } from "vitest";
import pino from "pino";
import { fetchFeed, extractEntries, resetParser } from "./feed-fetcher";
import type { FeedDocument } from "./feed-fetcher";
import { FeedFetchError, FeedParseError } from "../errors";

const logger = pino({ level: "silent" });
const http = { timeoutMs: 5000, userAgent: "feedcaster-test/1.0" };

const RSS_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Example Blog</title>
    <link>https://example.com</link>
    <description>Posts</description>
    <item>
      <title>Second post</title>
      <link>https://example.com/posts/2</link>
      <guid isPermaLink="false">post-2</guid>
      <pubDate>Tue, 10 Feb 2026 10:00:00 GMT</pubDate>
    </item>
    <item>
      <title>First post</title>
      <link>https://example.com/posts/1</link>
      <guid>post-1</guid>
    </item>
    <item>
      <title>Announcement without a link</title>
      <guid>post-0</guid>
    </item>
  </channel>
</rss>`;

const ATOM_FEED = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Example Atom</title>
  <id>urn:example:feed</id>
  <updated>2026-02-11T09:30:00Z</updated>
  <entry>
    <title>Atom post</title>
    <id>urn:uuid:atom-1</id>
    <link href="https://example.org/atom-1"/>
    <published>2026-02-11T09:30:00Z</published>
    <updated>2026-02-11T09:30:00Z</updated>
  </entry>
</feed>`;

describe("fetchFeed", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    resetParser();
  });

  it("should fetch and parse an RSS document", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response(RSS_FEED)));

    const feed = await fetchFeed("https://example.com/feed.xml", http, logger);

    expect(feed.items).toHaveLength(3);
    expect(feed.items[0]?.title).toBe("Second post");
  });

  it("should send the configured User-Agent and a feed Accept header", async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response(RSS_FEED));
    vi.stubGlobal("fetch", mockFetch);

    await fetchFeed("https://example.com/feed.xml", http, logger);

    expect(mockFetch).toHaveBeenCalledWith("https://example.com/feed.xml", {
      signal: expect.any(AbortSignal),
      headers: {
        "User-Agent": "feedcaster-test/1.0",
        Accept:
          "application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8",
      },
    });
  });

  it("should throw FeedFetchError on a non-success status", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(
        new Response("unavailable", { status: 503, statusText: "Service Unavailable" }),
      ),
    );

    const result = fetchFeed("https://example.com/feed.xml", http, logger);

    await expect(result).rejects.toBeInstanceOf(FeedFetchError);
    await expect(
      fetchFeed("https://example.com/feed.xml", http, logger),
    ).rejects.toThrow("HTTP 503: Service Unavailable");
  });

  it("should throw FeedFetchError when the request itself fails", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockRejectedValue(new Error("getaddrinfo ENOTFOUND example.com")),
    );

    const err = await fetchFeed("https://example.com/feed.xml", http, logger).catch(
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(FeedFetchError);
    if (err instanceof FeedFetchError) {
      expect(err.message).toBe("getaddrinfo ENOTFOUND example.com");
      expect(err.feedUrl).toBe("https://example.com/feed.xml");
      expect(err.code).toBe("FEED_FETCH_FAILED");
    }
  });

  it("should throw FeedParseError when the body is not a feed", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(new Response("<html><body>not a feed</body></html>")),
    );

    await expect(
      fetchFeed("https://example.com/feed.xml", http, logger),
    ).rejects.toBeInstanceOf(FeedParseError);
  });

  it("should decode a Shift_JIS feed using its XML declaration", async () => {
    const body = Buffer.concat([
      Buffer.from(
        '<?xml version="1.0" encoding="Shift_JIS"?><rss version="2.0"><channel><title>jp</title>' +
          "<item><title>",
      ),
      Buffer.from([0x83, 0x70, 0x81, 0x5b, 0x83, 0x54, 0x81, 0x5b]),
      Buffer.from("</title><link>https://example.jp/posts/1</link><guid>jp-1</guid></item>"),
      Buffer.from("</channel></rss>"),
    ]);
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response(body)));

    const feed = await fetchFeed("https://example.jp/feed.xml", http, logger);

    expect(extractEntries(feed)[0]?.title).toBe("パーサー");
  });
});

describe("extractEntries", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    resetParser();
  });

  it("should map RSS items in document order and drop items without a link", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response(RSS_FEED)));
    const feed = await fetchFeed("https://example.com/feed.xml", http, logger);

    expect(extractEntries(feed)).toEqual([
      {
        id: "post-2",
        url: "https://example.com/posts/2",
        title: "Second post",
        publishedAt: new Date("2026-02-10T10:00:00.000Z"),
      },
      {
        id: "post-1",
        url: "https://example.com/posts/1",
        title: "First post",
        publishedAt: null,
      },
    ]);
  });

  it("should use the Atom entry id when there is no guid", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response(ATOM_FEED)));
    const feed = await fetchFeed("https://example.org/atom.xml", http, logger);

    expect(extractEntries(feed)).toEqual([
      {
        id: "urn:uuid:atom-1",
        url: "https://example.org/atom-1",
        title: "Atom post",
        publishedAt: new Date("2026-02-11T09:30:00.000Z"),
      },
    ]);
  });

  it("should fall back to the link as id and tolerate missing title and date", () => {
    const feed: FeedDocument = {
      items: [{ link: "https://example.com/bare" }],
    };

    expect(extractEntries(feed)).toEqual([
      {
        id: "https://example.com/bare",
        url: "https://example.com/bare",
        title: null,
        publishedAt: null,
      },
    ]);
  });

  it("should treat an unparseable date as absent", () => {
    const feed: FeedDocument = {
      items: [{ guid: "g-1", link: "https://example.com/a", isoDate: "not a date" }],
    };

    expect(extractEntries(feed)[0]?.publishedAt).toBeNull();
  });

  it("should drop items whose link is blank", () => {
    const feed: FeedDocument = {
      items: [{ guid: "g-1", link: "   " }],
    };

    expect(extractEntries(feed)).toEqual([]);
  });
});
