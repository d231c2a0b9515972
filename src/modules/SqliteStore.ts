import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import {
  FeedkeeperError,
  StorageError,
  describeError,
  errorCode,
  isFeedkeeperError,
  notFound,
} from "../helpers/errors";
import { assertPrefixLength, pickSingleMatch } from "../helpers/identifiers";
import { createLogger } from "../helpers/logger";
import {
  Entry,
  EntryFilter,
  Feed,
  FeedStats,
  OverallStats,
} from "../types";
import {
  Store,
  duplicateEntry,
  duplicateUrl,
  filterFeedIds,
  lookupByIdOrPrefix,
} from "./Store";

const pino = createLogger("SqliteStore");

export const DATABASE_FILE_NAME = "feedkeeper.db";

const createTables = `
CREATE TABLE IF NOT EXISTS feeds (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  url TEXT NOT NULL UNIQUE,
  title TEXT,
  folder TEXT NOT NULL DEFAULT '',
  etag TEXT,
  last_modified TEXT,
  last_fetched_at TEXT,
  last_error TEXT,
  error_count INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS entries (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  feed_id TEXT NOT NULL REFERENCES feeds(id) ON DELETE CASCADE,
  guid TEXT NOT NULL,
  title TEXT,
  link TEXT,
  author TEXT,
  content TEXT,
  published_at TEXT,
  read INTEGER NOT NULL DEFAULT 0,
  read_at TEXT,
  created_at TEXT NOT NULL,
  UNIQUE(feed_id, guid)
);

CREATE INDEX IF NOT EXISTS idx_entries_feed_id ON entries(feed_id);
CREATE INDEX IF NOT EXISTS idx_entries_read ON entries(read);
CREATE INDEX IF NOT EXISTS idx_entries_published_at ON entries(published_at);

CREATE TABLE IF NOT EXISTS app_meta (
  key TEXT PRIMARY KEY,
  value TEXT
);
`;

const ensureEntriesFts = `
CREATE VIRTUAL TABLE IF NOT EXISTS entries_fts USING fts5(
  title,
  content,
  content='entries',
  content_rowid='seq',
  tokenize='unicode61 remove_diacritics 2'
);

CREATE TRIGGER IF NOT EXISTS entries_ai AFTER INSERT ON entries BEGIN
  INSERT INTO entries_fts(rowid, title, content)
  VALUES (new.seq, new.title, new.content);
END;

CREATE TRIGGER IF NOT EXISTS entries_ad AFTER DELETE ON entries BEGIN
  INSERT INTO entries_fts(entries_fts, rowid, title, content)
  VALUES ('delete', old.seq, old.title, old.content);
END;

CREATE TRIGGER IF NOT EXISTS entries_au AFTER UPDATE ON entries BEGIN
  INSERT INTO entries_fts(entries_fts, rowid, title, content)
  VALUES ('delete', old.seq, old.title, old.content);
  INSERT INTO entries_fts(rowid, title, content)
  VALUES (new.seq, new.title, new.content);
END;
`;

const rebuildEntriesFts = `
DROP TRIGGER IF EXISTS entries_ai;
DROP TRIGGER IF EXISTS entries_ad;
DROP TRIGGER IF EXISTS entries_au;
DROP TABLE IF EXISTS entries_fts;
${ensureEntriesFts}
INSERT INTO entries_fts(entries_fts) VALUES ('rebuild');
`;

// additive only; each may already be applied
const columnMigrations = [
  "ALTER TABLE feeds ADD COLUMN folder TEXT NOT NULL DEFAULT ''",
];

interface FeedRow {
  id: string;
  url: string;
  title: string | null;
  folder: string;
  etag: string | null;
  last_modified: string | null;
  last_fetched_at: string | null;
  last_error: string | null;
  error_count: number;
  created_at: string;
}

interface EntryRow {
  id: string;
  feed_id: string;
  guid: string;
  title: string | null;
  link: string | null;
  author: string | null;
  content: string | null;
  published_at: string | null;
  read: number;
  read_at: string | null;
  created_at: string;
}

interface FeedStatsRow {
  id: string;
  url: string;
  title: string | null;
  last_fetched_at: string | null;
  last_error: string | null;
  error_count: number;
  entry_count: number;
  unread_count: number;
}

type SqlValue = string | number | null;

const ENTRY_ORDER = "ORDER BY published_at IS NULL, published_at DESC";

function toIso(date: Date | undefined): string | null {
  return date ? date.toISOString() : null;
}

function fromIso(value: string | null): Date | undefined {
  return value === null ? undefined : new Date(value);
}

function optional(value: string | null): string | undefined {
  return value === null ? undefined : value;
}

function rowToFeed(row: FeedRow): Feed {
  return {
    id: row.id,
    url: row.url,
    title: optional(row.title),
    folder: row.folder,
    etag: optional(row.etag),
    lastModified: optional(row.last_modified),
    lastFetchedAt: fromIso(row.last_fetched_at),
    lastError: optional(row.last_error),
    errorCount: row.error_count,
    createdAt: new Date(row.created_at),
  };
}

function rowToEntry(row: EntryRow): Entry {
  return {
    id: row.id,
    feedId: row.feed_id,
    guid: row.guid,
    title: optional(row.title),
    link: optional(row.link),
    author: optional(row.author),
    content: optional(row.content),
    publishedAt: fromIso(row.published_at),
    read: row.read === 1,
    readAt: fromIso(row.read_at),
    createdAt: new Date(row.created_at),
  };
}


/**
 * Single-file relational backend on better-sqlite3. Foreign keys cascade
 * entry deletes; an external-content FTS5 table indexes titles and
 * content through triggers.
 */
export default class SqliteStore implements Store {
  private static readonly FTS_VERSION = "entries-unicode61-1";

  private database: Database.Database;

  constructor(dbPath: string) {
    pino.debug({ dbPath }, "Database path");

    try {
      if (dbPath !== ":memory:") {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }
      this.database = new Database(dbPath);
      this.database.pragma("journal_mode = WAL");
      this.database.pragma("foreign_keys = ON");
      this.database.exec(createTables);
      this.runMigrations();
    } catch (err) {
      throw new StorageError(`cannot open database ${dbPath}`, err);
    }
  }

  public static buildFtsQuery(searchQuery: string): string {
    return searchQuery
      .normalize("NFKC")
      .trim()
      .split(/\s+/)
      .filter((token) => token.length > 0)
      .map((token) => `"${token.replace(/"/g, '""')}"*`)
      .join(" AND ");
  }

  private runMigrations(): void {
    for (const migration of columnMigrations) {
      try {
        this.database.exec(migration);
        pino.info({ migration }, "Applied schema migration");
      } catch (err) {
        if (!describeError(err).includes("duplicate column")) {
          throw err;
        }
      }
    }

    const row = this.database
      .prepare<[], { value: string | null }>(
        "SELECT value FROM app_meta WHERE key = 'fts_version'"
      )
      .get();
    const shouldRebuild = row?.value !== SqliteStore.FTS_VERSION;

    this.database.exec(shouldRebuild ? rebuildEntriesFts : ensureEntriesFts);

    if (shouldRebuild) {
      this.database
        .prepare<[string]>(
          `INSERT INTO app_meta (key, value) VALUES ('fts_version', ?)
           ON CONFLICT(key) DO UPDATE SET value = excluded.value`
        )
        .run(SqliteStore.FTS_VERSION);
      pino.debug("FTS index rebuilt");
    }
  }

  /** Maps driver failures to StorageError; domain errors pass through. */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (isFeedkeeperError(err)) {
        throw err;
      }
      pino.error({ err, operation }, "Database operation failed");
      throw new StorageError(operation, err);
    }
  }

  // --- feeds ---

  public createFeed(feed: Feed): void {
    this.guard("create feed", () => {
      try {
        this.database
          .prepare<SqlValue[]>(
            `INSERT INTO feeds (id, url, title, folder, etag, last_modified,
               last_fetched_at, last_error, error_count, created_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
          )
          .run(
            feed.id,
            feed.url,
            feed.title ?? null,
            feed.folder,
            feed.etag ?? null,
            feed.lastModified ?? null,
            toIso(feed.lastFetchedAt),
            feed.lastError ?? null,
            feed.errorCount,
            feed.createdAt.toISOString()
          );
      } catch (err) {
        if (errorCode(err) === "SQLITE_CONSTRAINT_UNIQUE") {
          throw duplicateUrl(feed.url);
        }
        throw err;
      }
      pino.debug({ id: feed.id, url: feed.url }, "Feed created");
    });
  }

  public getFeed(id: string): Feed {
    return this.guard("get feed", () => {
      const row = this.database
        .prepare<[string], FeedRow>("SELECT * FROM feeds WHERE id = ?")
        .get(id);
      if (!row) {
        throw notFound("feed", id);
      }
      return rowToFeed(row);
    });
  }

  public getFeedByUrl(url: string): Feed {
    return this.guard("get feed by url", () => {
      const row = this.database
        .prepare<[string], FeedRow>("SELECT * FROM feeds WHERE url = ?")
        .get(url);
      if (!row) {
        throw notFound("feed", url);
      }
      return rowToFeed(row);
    });
  }

  public getFeedByPrefix(prefix: string): Feed {
    assertPrefixLength(prefix);
    return this.guard("get feed by prefix", () => {
      const rows = this.database
        .prepare<[string, string], FeedRow>(
          "SELECT * FROM feeds WHERE substr(id, 1, length(?)) = ?"
        )
        .all(prefix, prefix);
      return rowToFeed(pickSingleMatch("feed", prefix, rows));
    });
  }

  public getFeedByUrlOrPrefix(ref: string): Feed {
    return lookupByIdOrPrefix(
      (url) => this.getFeedByUrl(url),
      (prefix) => this.getFeedByPrefix(prefix),
      ref
    );
  }

  public listFeeds(): Feed[] {
    return this.guard("list feeds", () =>
      this.database
        .prepare<[], FeedRow>("SELECT * FROM feeds ORDER BY created_at DESC, seq DESC")
        .all()
        .map(rowToFeed)
    );
  }

  public updateFeed(feed: Feed): void {
    this.guard("update feed", () => {
      const result = this.database
        .prepare<SqlValue[]>(
          `UPDATE feeds SET title = ?, folder = ?, etag = ?, last_modified = ?,
             last_fetched_at = ?, last_error = ?, error_count = ?
           WHERE id = ?`
        )
        .run(
          feed.title ?? null,
          feed.folder,
          feed.etag ?? null,
          feed.lastModified ?? null,
          toIso(feed.lastFetchedAt),
          feed.lastError ?? null,
          feed.errorCount,
          feed.id
        );
      if (result.changes === 0) {
        throw notFound("feed", feed.id);
      }
    });
  }

  public deleteFeed(id: string): void {
    this.guard("delete feed", () => {
      const result = this.database
        .prepare<[string]>("DELETE FROM feeds WHERE id = ?")
        .run(id);
      if (result.changes === 0) {
        throw notFound("feed", id);
      }
      pino.debug({ id }, "Feed deleted");
    });
  }

  public updateFeedFetchState(
    id: string,
    etag: string | undefined,
    lastModified: string | undefined,
    fetchedAt: Date
  ): void {
    this.guard("update feed fetch state", () => {
      const result = this.database
        .prepare<SqlValue[]>(
          `UPDATE feeds SET etag = ?, last_modified = ?, last_fetched_at = ?,
             last_error = NULL, error_count = 0
           WHERE id = ?`
        )
        .run(etag ?? null, lastModified ?? null, fetchedAt.toISOString(), id);
      if (result.changes === 0) {
        throw notFound("feed", id);
      }
    });
  }

  public updateFeedError(id: string, message: string): void {
    this.guard("update feed error", () => {
      const result = this.database
        .prepare<[string, string]>(
          "UPDATE feeds SET last_error = ?, error_count = error_count + 1 WHERE id = ?"
        )
        .run(message, id);
      if (result.changes === 0) {
        throw notFound("feed", id);
      }
    });
  }

  // --- entries ---

  public createEntry(entry: Entry): void {
    this.guard("create entry", () => {
      try {
        this.database
          .prepare<SqlValue[]>(
            `INSERT INTO entries (id, feed_id, guid, title, link, author, content,
               published_at, read, read_at, created_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
          )
          .run(
            entry.id,
            entry.feedId,
            entry.guid,
            entry.title ?? null,
            entry.link ?? null,
            entry.author ?? null,
            entry.content ?? null,
            toIso(entry.publishedAt),
            entry.read ? 1 : 0,
            entry.read ? toIso(entry.readAt ?? new Date()) : null,
            entry.createdAt.toISOString()
          );
      } catch (err) {
        const code = errorCode(err);
        if (code === "SQLITE_CONSTRAINT_UNIQUE") {
          throw duplicateEntry(entry.feedId, entry.guid);
        }
        if (code === "SQLITE_CONSTRAINT_FOREIGNKEY") {
          throw notFound("feed", entry.feedId);
        }
        throw err;
      }
    });
  }

  public getEntry(id: string): Entry {
    return this.guard("get entry", () => {
      const row = this.database
        .prepare<[string], EntryRow>("SELECT * FROM entries WHERE id = ?")
        .get(id);
      if (!row) {
        throw notFound("entry", id);
      }
      return rowToEntry(row);
    });
  }

  public getEntryByPrefix(prefix: string): Entry {
    assertPrefixLength(prefix);
    return this.guard("get entry by prefix", () => {
      const rows = this.database
        .prepare<[string, string], EntryRow>(
          "SELECT * FROM entries WHERE substr(id, 1, length(?)) = ?"
        )
        .all(prefix, prefix);
      return rowToEntry(pickSingleMatch("entry", prefix, rows));
    });
  }

  public getEntryByIdOrPrefix(ref: string): Entry {
    return lookupByIdOrPrefix(
      (id) => this.getEntry(id),
      (prefix) => this.getEntryByPrefix(prefix),
      ref
    );
  }

  public listEntries(filter: EntryFilter = {}): Entry[] {
    return this.guard("list entries", () => {
      const conditions: string[] = [];
      const params: SqlValue[] = [];

      const feedIds = filterFeedIds(filter);
      if (feedIds !== undefined) {
        if (feedIds.length === 0) {
          return [];
        }
        conditions.push(`feed_id IN (${feedIds.map(() => "?").join(", ")})`);
        params.push(...feedIds);
      }
      if (filter.unreadOnly) {
        conditions.push("read = 0");
      }
      if (filter.since !== undefined) {
        conditions.push("published_at IS NOT NULL AND published_at >= ?");
        params.push(filter.since.toISOString());
      }
      if (filter.until !== undefined) {
        conditions.push("published_at IS NOT NULL AND published_at < ?");
        params.push(filter.until.toISOString());
      }

      let query = "SELECT * FROM entries";
      if (conditions.length > 0) {
        query += ` WHERE ${conditions.join(" AND ")}`;
      }
      query += ` ${ENTRY_ORDER}`;

      if (filter.limit !== undefined && filter.limit > 0) {
        query += " LIMIT ? OFFSET ?";
        params.push(filter.limit, Math.max(0, filter.offset ?? 0));
      } else if (filter.offset !== undefined && filter.offset > 0) {
        query += " LIMIT -1 OFFSET ?";
        params.push(filter.offset);
      }

      return this.database
        .prepare<SqlValue[], EntryRow>(query)
        .all(...params)
        .map(rowToEntry);
    });
  }

  public updateEntry(entry: Entry): void {
    this.guard("update entry", () => {
      const readAt = entry.read ? toIso(entry.readAt ?? new Date()) : null;
      const result = this.database
        .prepare<SqlValue[]>(
          `UPDATE entries SET title = ?, link = ?, author = ?, content = ?,
             published_at = ?, read = ?, read_at = ?
           WHERE id = ?`
        )
        .run(
          entry.title ?? null,
          entry.link ?? null,
          entry.author ?? null,
          entry.content ?? null,
          toIso(entry.publishedAt),
          entry.read ? 1 : 0,
          readAt,
          entry.id
        );
      if (result.changes === 0) {
        throw notFound("entry", entry.id);
      }
    });
  }

  public deleteEntry(id: string): void {
    this.guard("delete entry", () => {
      const result = this.database
        .prepare<[string]>("DELETE FROM entries WHERE id = ?")
        .run(id);
      if (result.changes === 0) {
        throw notFound("entry", id);
      }
    });
  }

  public markEntryRead(id: string): void {
    this.guard("mark entry read", () => {
      const result = this.database
        .prepare<[string, string]>(
          "UPDATE entries SET read = 1, read_at = ? WHERE id = ?"
        )
        .run(new Date().toISOString(), id);
      if (result.changes === 0) {
        throw notFound("entry", id);
      }
    });
  }

  public markEntryUnread(id: string): void {
    this.guard("mark entry unread", () => {
      const result = this.database
        .prepare<[string]>("UPDATE entries SET read = 0, read_at = NULL WHERE id = ?")
        .run(id);
      if (result.changes === 0) {
        throw notFound("entry", id);
      }
    });
  }

  public markEntriesReadBefore(cutoff: Date): number {
    return this.guard("mark entries read", () => {
      const result = this.database
        .prepare<[string, string]>(
          `UPDATE entries SET read = 1, read_at = ?
           WHERE read = 0 AND published_at IS NOT NULL AND published_at < ?`
        )
        .run(new Date().toISOString(), cutoff.toISOString());
      return result.changes;
    });
  }

  public entryExists(feedId: string, guid: string): boolean {
    return this.guard("check entry", () => {
      const row = this.database
        .prepare<[string, string], { found: number }>(
          "SELECT 1 AS found FROM entries WHERE feed_id = ? AND guid = ?"
        )
        .get(feedId, guid);
      return row !== undefined;
    });
  }

  public countUnreadEntries(feedId?: string): number {
    return this.guard("count unread entries", () => {
      const row =
        feedId === undefined
          ? this.database
              .prepare<[], { n: number }>(
                "SELECT COUNT(*) AS n FROM entries WHERE read = 0"
              )
              .get()
          : this.database
              .prepare<[string], { n: number }>(
                "SELECT COUNT(*) AS n FROM entries WHERE read = 0 AND feed_id = ?"
              )
              .get(feedId);
      return row?.n ?? 0;
    });
  }

  // --- stats and maintenance ---

  public getFeedStats(): FeedStats[] {
    return this.guard("get feed stats", () =>
      this.database
        .prepare<[], FeedStatsRow>(
          `SELECT f.id, f.url, f.title, f.last_fetched_at, f.last_error, f.error_count,
             COUNT(e.id) AS entry_count,
             COALESCE(SUM(CASE WHEN e.read = 0 THEN 1 ELSE 0 END), 0) AS unread_count
           FROM feeds f
           LEFT JOIN entries e ON e.feed_id = f.id
           GROUP BY f.seq
           ORDER BY f.created_at DESC, f.seq DESC`
        )
        .all()
        .map((row) => ({
          feedId: row.id,
          feedUrl: row.url,
          feedTitle: optional(row.title),
          lastFetchedAt: fromIso(row.last_fetched_at),
          lastError: optional(row.last_error),
          errorCount: row.error_count,
          entryCount: row.entry_count,
          unreadCount: row.unread_count,
        }))
    );
  }

  public getOverallStats(): OverallStats {
    return this.guard("get overall stats", () => {
      const row = this.database
        .prepare<[], OverallStats>(
          `SELECT
             (SELECT COUNT(*) FROM feeds) AS totalFeeds,
             (SELECT COUNT(*) FROM entries) AS totalEntries,
             (SELECT COUNT(*) FROM entries WHERE read = 0) AS unreadCount`
        )
        .get();
      return row ?? { totalFeeds: 0, totalEntries: 0, unreadCount: 0 };
    });
  }

  public compact(): void {
    this.guard("compact database", () => {
      this.database.exec("VACUUM");
      pino.debug("Database vacuumed");
    });
  }

  public search(query: string, limit: number): Entry[] {
    const ftsQuery = SqliteStore.buildFtsQuery(query);
    if (!ftsQuery) {
      return [];
    }
    return this.guard("search entries", () =>
      this.database
        .prepare<[string, number], EntryRow>(
          `SELECT entries.* FROM entries
           INNER JOIN entries_fts ON entries_fts.rowid = entries.seq
           WHERE entries_fts MATCH ?
           ORDER BY entries.published_at IS NULL, entries.published_at DESC
           LIMIT ?`
        )
        .all(ftsQuery, limit > 0 ? limit : -1)
        .map(rowToEntry)
    );
  }

  public transaction<T>(fn: () => T): T {
    return this.database.transaction(fn)();
  }

  public close(): void {
    if (!this.database.open) {
      return;
    }
    try {
      this.database.close();
    } catch (err) {
      throw new FeedkeeperError("StorageError", "cannot close database", {
        cause: err,
      });
    }
  }
}
