import fs from "fs";
import path from "path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import DirectoryLock from "../helpers/DirectoryLock";
import {
  FeedkeeperError,
  StorageError,
  errorCode,
  isFeedkeeperError,
  notFound,
} from "../helpers/errors";
import {
  isRecord,
  parseFrontMatter,
  renderFrontMatter,
} from "../helpers/frontMatter";
import { assertPrefixLength, pickSingleMatch } from "../helpers/identifiers";
import { createLogger } from "../helpers/logger";
import { slugify } from "../helpers/slugify";
import {
  Entry,
  EntryFilter,
  Feed,
  FeedStats,
  OverallStats,
} from "../types";
import {
  Store,
  applyEntryFilter,
  compareByPublishedDesc,
  duplicateEntry,
  duplicateUrl,
  filterFeedIds,
  lookupByIdOrPrefix,
} from "./Store";

const pino = createLogger("MarkdownStore");

export const REGISTRY_FILE_NAME = "_feeds.yaml";
const ENTRY_EXTENSION = ".md";
const ENTRY_ID_LENGTH = 8;

interface FeedRecord {
  feed: Feed;
  slug: string;
}

interface Journal {
  // original content of every file touched, null when it did not exist
  originals: Map<string, string | null>;
  entryCache: Map<string, Entry[]>;
}

// --- field readers over parsed YAML ---

function requireString(data: Record<string, unknown>, key: string): string {
  const value = data[key];
  if (typeof value !== "string" || value === "") {
    throw new Error(`field "${key}" must be a non-empty string`);
  }
  return value;
}

function optionalString(
  data: Record<string, unknown>,
  key: string
): string | undefined {
  const value = data[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`field "${key}" must be a string`);
  }
  return value;
}

function requireDate(data: Record<string, unknown>, key: string): Date {
  const date = new Date(requireString(data, key));
  if (Number.isNaN(date.getTime())) {
    throw new Error(`field "${key}" is not a timestamp`);
  }
  return date;
}

function optionalDate(
  data: Record<string, unknown>,
  key: string
): Date | undefined {
  return optionalString(data, key) === undefined
    ? undefined
    : requireDate(data, key);
}

function isoOrUndefined(date: Date | undefined): string | undefined {
  return date?.toISOString();
}

// --- registry and entry file formats ---

function recordToYaml({ feed, slug }: FeedRecord): Record<string, unknown> {
  return {
    id: feed.id,
    url: feed.url,
    title: feed.title,
    folder: feed.folder,
    etag: feed.etag,
    last_modified: feed.lastModified,
    last_fetched_at: isoOrUndefined(feed.lastFetchedAt),
    last_error: feed.lastError,
    error_count: feed.errorCount,
    created_at: feed.createdAt.toISOString(),
    slug,
  };
}

function recordFromYaml(data: Record<string, unknown>): FeedRecord {
  const errorCount = data.error_count ?? 0;
  if (typeof errorCount !== "number" || !Number.isInteger(errorCount)) {
    throw new Error('field "error_count" must be an integer');
  }
  return {
    slug: requireString(data, "slug"),
    feed: {
      id: requireString(data, "id"),
      url: requireString(data, "url"),
      title: optionalString(data, "title"),
      folder: optionalString(data, "folder") ?? "",
      etag: optionalString(data, "etag"),
      lastModified: optionalString(data, "last_modified"),
      lastFetchedAt: optionalDate(data, "last_fetched_at"),
      lastError: optionalString(data, "last_error"),
      errorCount,
      createdAt: requireDate(data, "created_at"),
    },
  };
}

function readRegistryItem(item: unknown): { record: FeedRecord } | { error: unknown } {
  try {
    if (!isRecord(item)) {
      throw new Error("record is not a mapping");
    }
    return { record: recordFromYaml(item) };
  } catch (error) {
    return { error };
  }
}

function renderEntry(entry: Entry): string {
  const frontMatter = {
    id: entry.id,
    feed_id: entry.feedId,
    guid: entry.guid,
    title: entry.title,
    link: entry.link,
    author: entry.author,
    published_at: isoOrUndefined(entry.publishedAt),
    read: entry.read,
    read_at: entry.read ? isoOrUndefined(entry.readAt) : undefined,
    created_at: entry.createdAt.toISOString(),
  };
  const body = entry.content ? `\n${entry.content}\n` : "";
  return renderFrontMatter(frontMatter, body);
}

function parseEntry(document: string): Entry {
  const { data, body } = parseFrontMatter(document);
  if (typeof data.read !== "boolean") {
    throw new Error('field "read" must be a boolean');
  }
  const content = body.replace(/^\r?\n/, "").replace(/\r?\n$/, "");

  return {
    id: requireString(data, "id"),
    feedId: requireString(data, "feed_id"),
    guid: requireString(data, "guid"),
    title: optionalString(data, "title"),
    link: optionalString(data, "link"),
    author: optionalString(data, "author"),
    content: content === "" ? undefined : content,
    publishedAt: optionalDate(data, "published_at"),
    read: data.read,
    readAt: data.read ? optionalDate(data, "read_at") : undefined,
    createdAt: requireDate(data, "created_at"),
  };
}

export function entryFileName(entry: Entry): string {
  const slug = slugify(entry.title ?? "") || "untitled";
  return `${slug}-${entry.id.slice(0, ENTRY_ID_LENGTH)}${ENTRY_EXTENSION}`;
}

function fileIdPart(fileName: string): string {
  return fileName.slice(
    -(ENTRY_ID_LENGTH + ENTRY_EXTENSION.length),
    -ENTRY_EXTENSION.length
  );
}

function readOptionalFile(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw err;
  }
}

/**
 * Directory-of-files backend: a `_feeds.yaml` registry plus one directory
 * per feed holding one markdown file per entry. Every mutation runs under
 * the data directory lock and is rolled back file by file if it throws.
 */
export default class MarkdownStore implements Store {
  private readonly dataDir: string;

  private readonly lock: DirectoryLock;

  private journal: Journal | undefined;

  constructor(dataDir: string, options: { lockTimeoutMs?: number } = {}) {
    this.dataDir = path.resolve(dataDir);
    try {
      fs.mkdirSync(this.dataDir, { recursive: true });
    } catch (err) {
      throw new StorageError(`cannot create data directory ${this.dataDir}`, err);
    }
    this.lock = new DirectoryLock(this.dataDir, {
      timeoutMs: options.lockTimeoutMs,
    });
  }

  // --- low-level file access ---

  private get registryPath(): string {
    return path.join(this.dataDir, REGISTRY_FILE_NAME);
  }

  private feedDir(slug: string): string {
    return path.join(this.dataDir, slug);
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (isFeedkeeperError(err)) {
        throw err;
      }
      pino.error({ err, operation }, "Store operation failed");
      throw new StorageError(operation, err);
    }
  }

  private remember(filePath: string): void {
    if (this.journal && !this.journal.originals.has(filePath)) {
      this.journal.originals.set(filePath, readOptionalFile(filePath));
    }
  }

  /** Write to a temp file, fsync, rename over the target. */
  private writeAtomic(filePath: string, content: string): void {
    this.remember(filePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.tmp-${process.pid}-${Date.now()}`;
    const fd = fs.openSync(tempPath, "w");
    try {
      fs.writeSync(fd, content);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(tempPath, filePath);
  }

  private removeFile(filePath: string): void {
    this.remember(filePath);
    fs.rmSync(filePath, { force: true });
  }

  private removeDirectory(dir: string): void {
    if (this.journal && fs.existsSync(dir)) {
      for (const name of fs.readdirSync(dir)) {
        this.remember(path.join(dir, name));
      }
    }
    fs.rmSync(dir, { recursive: true, force: true });
  }

  private readRegistryItems(): unknown[] {
    const text = readOptionalFile(this.registryPath);
    if (text === null || text.trim() === "") {
      return [];
    }

    const parsed: unknown = parseYaml(text);
    if (!Array.isArray(parsed)) {
      throw new FeedkeeperError(
        "StorageError",
        `${this.registryPath} does not contain a list of feeds`
      );
    }
    return parsed;
  }

  private readRegistry(): FeedRecord[] {
    const records: FeedRecord[] = [];
    this.readRegistryItems().forEach((item, index) => {
      const read = readRegistryItem(item);
      if ("error" in read) {
        pino.warn({ err: read.error, index }, "Skipping malformed feed record");
        return;
      }
      records.push(read.record);
    });
    return records;
  }

  /** Rewrites the registry; records that do not parse are written back unchanged. */
  private writeRegistry(records: FeedRecord[]): void {
    const unreadable = this.readRegistryItems().filter(
      (item) => "error" in readRegistryItem(item)
    );
    this.writeAtomic(
      this.registryPath,
      stringifyYaml([...records.map(recordToYaml), ...unreadable], { lineWidth: 0 })
    );
  }

  private findRecord(records: FeedRecord[], feedId: string): FeedRecord {
    const record = records.find(({ feed }) => feed.id === feedId);
    if (!record) {
      throw notFound("feed", feedId);
    }
    return record;
  }

  private uniqueSlug(feed: Feed, records: FeedRecord[]): string {
    let host = "";
    try {
      host = new URL(feed.url).hostname;
    } catch (err) {
      pino.debug({ err, url: feed.url }, "Feed URL has no host");
    }
    const base = slugify(feed.title ?? "") || slugify(host) || "feed";

    const taken = new Set(records.map(({ slug }) => slug));
    const isFree = (slug: string) =>
      !taken.has(slug) && !fs.existsSync(this.feedDir(slug));

    if (isFree(base)) {
      return base;
    }
    for (let suffix = 2; ; suffix += 1) {
      const candidate = `${base}-${suffix}`;
      if (isFree(candidate)) {
        return candidate;
      }
    }
  }

  /** Entries of one feed directory keyed by file name; bad files are skipped. */
  private readEntryFiles(slug: string): Map<string, Entry> {
    const dir = this.feedDir(slug);
    const entries = new Map<string, Entry>();

    let names: string[];
    try {
      names = fs.readdirSync(dir);
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        return entries;
      }
      throw err;
    }

    for (const name of names.filter((n) => n.endsWith(ENTRY_EXTENSION)).sort()) {
      try {
        entries.set(name, parseEntry(fs.readFileSync(path.join(dir, name), "utf8")));
      } catch (err) {
        pino.debug({ err, file: path.join(dir, name) }, "Skipping unreadable entry file");
      }
    }
    return entries;
  }

  private readEntries(slug: string): Entry[] {
    const cached = this.journal?.entryCache.get(slug);
    if (cached) {
      return cached;
    }
    const entries = [...this.readEntryFiles(slug).values()];
    this.journal?.entryCache.set(slug, entries);
    return entries;
  }

  private writeEntry(slug: string, entry: Entry, previousFile?: string): void {
    const fileName = entryFileName(entry);
    this.writeAtomic(path.join(this.feedDir(slug), fileName), renderEntry(entry));
    if (previousFile !== undefined && previousFile !== fileName) {
      this.removeFile(path.join(this.feedDir(slug), previousFile));
    }

    const cached = this.journal?.entryCache.get(slug);
    if (cached) {
      const index = cached.findIndex(({ id }) => id === entry.id);
      if (index >= 0) {
        cached[index] = entry;
      } else {
        cached.push(entry);
      }
    }
  }

  /** Locates an entry by id prefix across every registered feed. */
  private findEntries(
    idPrefix: string
  ): { record: FeedRecord; fileName: string; entry: Entry }[] {
    const filePrefix = idPrefix.slice(0, ENTRY_ID_LENGTH);
    const found: { record: FeedRecord; fileName: string; entry: Entry }[] = [];

    for (const record of this.readRegistry()) {
      for (const [fileName, entry] of this.readEntryFiles(record.slug)) {
        if (
          fileIdPart(fileName).startsWith(filePrefix) &&
          entry.id.startsWith(idPrefix) &&
          entry.feedId === record.feed.id
        ) {
          found.push({ record, fileName, entry });
        }
      }
    }
    return found;
  }

  private findEntry(id: string): {
    record: FeedRecord;
    fileName: string;
    entry: Entry;
  } {
    const match = this.findEntries(id).find(({ entry }) => entry.id === id);
    if (!match) {
      throw notFound("entry", id);
    }
    return match;
  }

  private allEntries(records: FeedRecord[] = this.readRegistry()): Entry[] {
    return records.flatMap(({ slug, feed }) =>
      this.readEntries(slug).filter((entry) => entry.feedId === feed.id)
    );
  }

  // --- feeds ---

  public createFeed(feed: Feed): void {
    this.transaction(() => {
      const records = this.readRegistry();
      if (records.some((record) => record.feed.url === feed.url)) {
        throw duplicateUrl(feed.url);
      }
      const slug = this.uniqueSlug(feed, records);
      this.writeRegistry([...records, { feed, slug }]);
      fs.mkdirSync(this.feedDir(slug), { recursive: true });
      pino.debug({ id: feed.id, slug }, "Feed created");
    });
  }

  public getFeed(id: string): Feed {
    return this.guard("get feed", () => this.findRecord(this.readRegistry(), id).feed);
  }

  public getFeedByUrl(url: string): Feed {
    return this.guard("get feed by url", () => {
      const record = this.readRegistry().find(({ feed }) => feed.url === url);
      if (!record) {
        throw notFound("feed", url);
      }
      return record.feed;
    });
  }

  public getFeedByPrefix(prefix: string): Feed {
    assertPrefixLength(prefix);
    return this.guard("get feed by prefix", () =>
      pickSingleMatch(
        "feed",
        prefix,
        this.readRegistry()
          .map(({ feed }) => feed)
          .filter(({ id }) => id.startsWith(prefix))
      )
    );
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
      this.readRegistry()
        .map(({ feed }) => feed)
        .reverse()
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
    );
  }

  public updateFeed(feed: Feed): void {
    this.transaction(() => {
      const records = this.readRegistry();
      const record = this.findRecord(records, feed.id);
      record.feed = {
        ...feed,
        url: record.feed.url,
        createdAt: record.feed.createdAt,
      };
      this.writeRegistry(records);
    });
  }

  public deleteFeed(id: string): void {
    this.transaction(() => {
      const records = this.readRegistry();
      const record = this.findRecord(records, id);
      this.writeRegistry(records.filter((candidate) => candidate !== record));
      this.removeDirectory(this.feedDir(record.slug));
      this.journal?.entryCache.delete(record.slug);
      pino.debug({ id, slug: record.slug }, "Feed deleted");
    });
  }

  public updateFeedFetchState(
    id: string,
    etag: string | undefined,
    lastModified: string | undefined,
    fetchedAt: Date
  ): void {
    this.transaction(() => {
      const records = this.readRegistry();
      const record = this.findRecord(records, id);
      record.feed = {
        ...record.feed,
        etag: etag || undefined,
        lastModified: lastModified || undefined,
        lastFetchedAt: fetchedAt,
        lastError: undefined,
        errorCount: 0,
      };
      this.writeRegistry(records);
    });
  }

  public updateFeedError(id: string, message: string): void {
    this.transaction(() => {
      const records = this.readRegistry();
      const record = this.findRecord(records, id);
      record.feed = {
        ...record.feed,
        lastError: message,
        errorCount: record.feed.errorCount + 1,
      };
      this.writeRegistry(records);
    });
  }

  // --- entries ---

  public createEntry(entry: Entry): void {
    this.transaction(() => {
      const record = this.findRecord(this.readRegistry(), entry.feedId);
      if (this.readEntries(record.slug).some(({ guid }) => guid === entry.guid)) {
        throw duplicateEntry(entry.feedId, entry.guid);
      }
      this.writeEntry(record.slug, {
        ...entry,
        readAt: entry.read ? entry.readAt ?? new Date() : undefined,
      });
    });
  }

  public getEntry(id: string): Entry {
    return this.guard("get entry", () => this.findEntry(id).entry);
  }

  public getEntryByPrefix(prefix: string): Entry {
    assertPrefixLength(prefix);
    return this.guard("get entry by prefix", () =>
      pickSingleMatch(
        "entry",
        prefix,
        this.findEntries(prefix).map(({ entry }) => entry)
      )
    );
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
      const feedIds = filterFeedIds(filter);
      const records = this.readRegistry().filter(
        ({ feed }) => feedIds === undefined || feedIds.includes(feed.id)
      );
      return applyEntryFilter(this.allEntries(records), filter);
    });
  }

  public updateEntry(entry: Entry): void {
    this.transaction(() => {
      const { record, fileName, entry: current } = this.findEntry(entry.id);
      this.writeEntry(
        record.slug,
        {
          ...entry,
          feedId: current.feedId,
          guid: current.guid,
          createdAt: current.createdAt,
          readAt: entry.read ? entry.readAt ?? new Date() : undefined,
        },
        fileName
      );
    });
  }

  public deleteEntry(id: string): void {
    this.transaction(() => {
      const { record, fileName } = this.findEntry(id);
      this.removeFile(path.join(this.feedDir(record.slug), fileName));
      this.journal?.entryCache.delete(record.slug);
    });
  }

  public markEntryRead(id: string): void {
    this.transaction(() => {
      const { record, fileName, entry } = this.findEntry(id);
      this.writeEntry(record.slug, { ...entry, read: true, readAt: new Date() }, fileName);
    });
  }

  public markEntryUnread(id: string): void {
    this.transaction(() => {
      const { record, fileName, entry } = this.findEntry(id);
      this.writeEntry(
        record.slug,
        { ...entry, read: false, readAt: undefined },
        fileName
      );
    });
  }

  public markEntriesReadBefore(cutoff: Date): number {
    return this.transaction(() => {
      const now = new Date();
      let count = 0;
      for (const record of this.readRegistry()) {
        for (const [fileName, entry] of this.readEntryFiles(record.slug)) {
          if (
            entry.feedId === record.feed.id &&
            !entry.read &&
            entry.publishedAt !== undefined &&
            entry.publishedAt.getTime() < cutoff.getTime()
          ) {
            this.writeEntry(record.slug, { ...entry, read: true, readAt: now }, fileName);
            count += 1;
          }
        }
      }
      return count;
    });
  }

  public entryExists(feedId: string, guid: string): boolean {
    return this.guard("check entry", () => {
      const record = this.readRegistry().find(({ feed }) => feed.id === feedId);
      if (!record) {
        return false;
      }
      return this.readEntries(record.slug).some((entry) => entry.guid === guid);
    });
  }

  public countUnreadEntries(feedId?: string): number {
    return this.guard("count unread entries", () =>
      this.allEntries().filter(
        (entry) => !entry.read && (feedId === undefined || entry.feedId === feedId)
      ).length
    );
  }

  // --- stats and maintenance ---

  public getFeedStats(): FeedStats[] {
    return this.guard("get feed stats", () =>
      this.listFeeds().map((feed) => {
        const entries = this.listEntries({ feedId: feed.id });
        return {
          feedId: feed.id,
          feedUrl: feed.url,
          feedTitle: feed.title,
          lastFetchedAt: feed.lastFetchedAt,
          lastError: feed.lastError,
          errorCount: feed.errorCount,
          entryCount: entries.length,
          unreadCount: entries.filter((entry) => !entry.read).length,
        };
      })
    );
  }

  public getOverallStats(): OverallStats {
    return this.guard("get overall stats", () => {
      const records = this.readRegistry();
      const entries = this.allEntries(records);
      return {
        totalFeeds: records.length,
        totalEntries: entries.length,
        unreadCount: entries.filter((entry) => !entry.read).length,
      };
    });
  }

  public compact(): void {
    pino.debug("Nothing to compact for the markdown backend");
  }

  public search(query: string, limit: number): Entry[] {
    const needle = query.trim().toLowerCase();
    if (!needle) {
      return [];
    }
    return this.guard("search entries", () => {
      const matches = this.allEntries()
        .filter(
          (entry) =>
            (entry.title ?? "").toLowerCase().includes(needle) ||
            (entry.content ?? "").toLowerCase().includes(needle)
        )
        .sort(compareByPublishedDesc);
      return limit > 0 ? matches.slice(0, limit) : matches;
    });
  }

  public transaction<T>(fn: () => T): T {
    return this.lock.withLock(() => {
      if (this.journal) {
        return fn();
      }

      this.journal = { originals: new Map(), entryCache: new Map() };
      try {
        return this.guard("write", fn);
      } catch (err) {
        this.rollback(this.journal);
        throw err;
      } finally {
        this.journal = undefined;
      }
    });
  }

  private rollback(journal: Journal): void {
    for (const [filePath, original] of [...journal.originals].reverse()) {
      if (original === null) {
        fs.rmSync(filePath, { force: true });
      } else {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, original);
      }
    }
    pino.debug({ files: journal.originals.size }, "Rolled back failed write");
  }

  public close(): void {
    // the lock is only held for the span of a write
    pino.debug({ dataDir: this.dataDir }, "Markdown store closed");
  }
}
