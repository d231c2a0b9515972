import fs from "fs";
import path from "path";
import { makeEntry, makeFeed, makeTempDir } from "../testing/fixtures";
import { Entry, Feed } from "../types";
import MarkdownStore from "./MarkdownStore";
import SqliteStore from "./SqliteStore";
import { Store } from "./Store";
import { isDirNonEmpty, migrateData } from "./StoreMigrator";

const byId = <T extends { id: string }>(items: T[]): T[] =>
  [...items].sort((a, b) => a.id.localeCompare(b.id));

function snapshot(store: Store): { feeds: Feed[]; entries: Entry[] } {
  return {
    feeds: byId(store.listFeeds()),
    entries: byId(store.listEntries()),
  };
}

describe("StoreMigrator", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("migrate");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("migrateData", () => {
    let source: SqliteStore;

    beforeEach(() => {
      source = new SqliteStore(path.join(dir, "a", "feedkeeper.db"));

      const news = makeFeed("https://news.example/rss", {
        title: "News",
        folder: "daily",
        etag: '"n1"',
        lastFetchedAt: new Date("2024-06-01T08:00:00.000Z"),
      });
      const blog = makeFeed("https://blog.example/atom.xml", {
        title: "Blog",
        lastError: "timeout",
        errorCount: 3,
        createdAt: new Date("2024-02-01T00:00:00.000Z"),
      });
      source.createFeed(news);
      source.createFeed(blog);

      source.createEntry(
        makeEntry(news.id, "n-1", {
          title: "First story",
          link: "https://news.example/1",
          author: "Reporter",
          content: "<p>One</p>",
          publishedAt: new Date("2024-05-30T12:00:00.000Z"),
        })
      );
      source.createEntry(
        makeEntry(news.id, "n-2", {
          title: "Second story",
          publishedAt: new Date("2024-05-31T12:00:00.000Z"),
        })
      );
      source.createEntry(makeEntry(news.id, "n-3", { title: "Undated story" }));
      const read = makeEntry(blog.id, "b-1", {
        title: "Hello: a post",
        content: "line one\n\nline two",
        publishedAt: new Date("2024-04-01T00:00:00.000Z"),
      });
      source.createEntry(read);
      source.createEntry(makeEntry(blog.id, "b-2", { title: "Another post" }));
      source.markEntryRead(read.id);
    });

    afterEach(() => {
      source.close();
    });

    it("returns the number of feeds and entries copied", () => {
      const markdown = new MarkdownStore(path.join(dir, "b"));

      expect(migrateData(source, markdown)).toEqual({ feeds: 2, entries: 5 });
      expect(markdown.getOverallStats()).toEqual({
        totalFeeds: 2,
        totalEntries: 5,
        unreadCount: 4,
      });
    });

    it("round-trips every field through the file backend", () => {
      const markdown = new MarkdownStore(path.join(dir, "b"));
      const restored = new SqliteStore(path.join(dir, "c", "feedkeeper.db"));
      try {
        migrateData(source, markdown);
        migrateData(markdown, restored);

        const original = snapshot(source);
        expect(snapshot(markdown)).toEqual(original);
        expect(snapshot(restored)).toEqual(original);
        expect(restored.listEntries().filter((entry) => entry.read)).toHaveLength(1);
      } finally {
        restored.close();
      }
    });

    it("stops at the first conflict in a non-empty destination", () => {
      const markdown = new MarkdownStore(path.join(dir, "b"));
      markdown.createFeed(makeFeed("https://blog.example/atom.xml"));

      expect(() => migrateData(source, markdown)).toThrow(
        expect.objectContaining({ kind: "DuplicateURL" })
      );
    });

    it("copies nothing from an empty store", () => {
      const empty = new MarkdownStore(path.join(dir, "empty"));
      const target = new MarkdownStore(path.join(dir, "target"));

      expect(migrateData(empty, target)).toEqual({ feeds: 0, entries: 0 });
    });
  });

  describe("isDirNonEmpty", () => {
    it("is false for a missing directory", () => {
      expect(isDirNonEmpty(path.join(dir, "missing"))).toBe(false);
    });

    it("is false for an empty directory", () => {
      expect(isDirNonEmpty(dir)).toBe(false);
    });

    it("is true once anything is inside", () => {
      fs.writeFileSync(path.join(dir, "x"), "");
      expect(isDirNonEmpty(dir)).toBe(true);
    });

    it("reports paths that are not directories", () => {
      const file = path.join(dir, "file");
      fs.writeFileSync(file, "");
      expect(() => isDirNonEmpty(file)).toThrow(
        expect.objectContaining({ kind: "StorageError" })
      );
    });
  });
});
