import { describe, it, expect } from "vitest";
import { computeDelta, orderNewestFirst } from "./delta";
import type { FeedEntry } from "../pipeline/types";

function entry(id: string): FeedEntry {
  return {
    id,
    url: `https://example.com/posts/${id}`,
    title: `Post ${id}`,
    publishedAt: null,
  };
}

// newest first, as feeds publish them
const entries = [entry("e5"), entry("e4"), entry("e3"), entry("e2"), entry("e1")];

const ids = (list: ReadonlyArray<FeedEntry>) => list.map((e) => e.id);

function dated(id: string, iso: string): FeedEntry {
  return { ...entry(id), publishedAt: new Date(iso) };
}

// oldest first, as some Atom generators emit them
const ascending = [
  dated("e1", "2026-03-01T08:00:00Z"),
  dated("e2", "2026-03-02T08:00:00Z"),
  dated("e3", "2026-03-03T08:00:00Z"),
];

describe("computeDelta", () => {
  describe("without a cursor", () => {
    it("should return only the newest entry", () => {
      expect(ids(computeDelta(entries, null))).toEqual(["e5"]);
    });

    it("should return nothing for an empty feed", () => {
      expect(computeDelta([], null)).toEqual([]);
    });
  });

  describe("with a cursor", () => {
    it("should return entries newer than the cursor oldest first", () => {
      expect(ids(computeDelta(entries, "e3"))).toEqual(["e4", "e5"]);
    });

    it("should return nothing when the cursor is the newest entry", () => {
      expect(computeDelta(entries, "e5")).toEqual([]);
    });

    it("should return every fetched entry reversed when the cursor is not in the feed", () => {
      expect(ids(computeDelta(entries, "gone"))).toEqual(["e1", "e2", "e3", "e4", "e5"]);
    });

    it("should match entries 0..k-1 reversed for a cursor at position k", () => {
      for (let k = 0; k < entries.length; k++) {
        const cursor = entries[k]?.id ?? "";
        const expected = ids(entries.slice(0, k)).reverse();
        expect(ids(computeDelta(entries, cursor))).toEqual(expected);
      }
    });

    it("should skip duplicate ids within one document", () => {
      const withDuplicate = [entry("e5"), entry("e4"), entry("e5"), entry("e3")];
      expect(ids(computeDelta(withDuplicate, "e3"))).toEqual(["e4", "e5"]);
    });

    it("should return an empty delta for an empty feed", () => {
      expect(computeDelta([], "e1")).toEqual([]);
    });
  });

  it("should not mutate the input", () => {
    const input = [entry("b"), entry("a")];
    computeDelta(input, "missing");
    expect(ids(input)).toEqual(["b", "a"]);
  });

  describe("with publish dates", () => {
    it("should return the latest entry of an oldest-first feed without a cursor", () => {
      expect(ids(computeDelta(ascending, null))).toEqual(["e3"]);
    });

    it("should return only entries published after the cursor in an oldest-first feed", () => {
      expect(ids(computeDelta(ascending, "e2"))).toEqual(["e3"]);
    });

    it("should return nothing when the cursor is the latest entry of an oldest-first feed", () => {
      expect(computeDelta(ascending, "e3")).toEqual([]);
    });

    it("should publish a shuffled feed in date order", () => {
      const shuffled = [ascending[1], ascending[2], ascending[0]].flatMap((e) => (e ? [e] : []));
      expect(ids(computeDelta(shuffled, "gone"))).toEqual(["e1", "e2", "e3"]);
    });
  });
});

describe("orderNewestFirst", () => {
  it("should sort by publish date when every entry has one", () => {
    expect(ids(orderNewestFirst(ascending))).toEqual(["e3", "e2", "e1"]);
  });

  it("should keep document order when any entry lacks a date", () => {
    const mixed = [dated("e1", "2026-03-01T08:00:00Z"), entry("e2"), dated("e3", "2026-03-03T08:00:00Z")];
    expect(ids(orderNewestFirst(mixed))).toEqual(["e1", "e2", "e3"]);
  });

  it("should keep document order among entries with the same date", () => {
    const sameDay = [
      dated("a", "2026-03-01T08:00:00Z"),
      dated("b", "2026-03-01T08:00:00Z"),
      dated("c", "2026-03-02T08:00:00Z"),
    ];
    expect(ids(orderNewestFirst(sameDay))).toEqual(["c", "a", "b"]);
  });
});
