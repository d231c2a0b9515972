import { FeedkeeperError, isFeedkeeperError } from "../helpers/errors";
import { newId } from "../helpers/identifiers";
import {
  Entry,
  EntryFilter,
  Feed,
  FeedStats,
  OverallStats,
  ParsedEntry,
} from "../types";

/**
 * Persistence boundary for feeds and entries. Every operation is
 * synchronous; implementations must keep failed writes invisible.
 */
export interface Store {
  // feeds
  createFeed(feed: Feed): void;
  getFeed(id: string): Feed;
  getFeedByUrl(url: string): Feed;
  getFeedByPrefix(prefix: string): Feed;
  getFeedByUrlOrPrefix(ref: string): Feed;
  listFeeds(): Feed[];
  updateFeed(feed: Feed): void;
  deleteFeed(id: string): void;
  updateFeedFetchState(
    id: string,
    etag: string | undefined,
    lastModified: string | undefined,
    fetchedAt: Date
  ): void;
  updateFeedError(id: string, message: string): void;

  // entries
  createEntry(entry: Entry): void;
  getEntry(id: string): Entry;
  getEntryByPrefix(prefix: string): Entry;
  getEntryByIdOrPrefix(ref: string): Entry;
  listEntries(filter?: EntryFilter): Entry[];
  updateEntry(entry: Entry): void;
  deleteEntry(id: string): void;
  markEntryRead(id: string): void;
  markEntryUnread(id: string): void;
  markEntriesReadBefore(cutoff: Date): number;
  entryExists(feedId: string, guid: string): boolean;
  countUnreadEntries(feedId?: string): number;

  // stats and maintenance
  getFeedStats(): FeedStats[];
  getOverallStats(): OverallStats;
  compact(): void;
  search(query: string, limit: number): Entry[];

  /** Runs `fn` so that its writes become visible together or not at all. */
  transaction<T>(fn: () => T): T;
  close(): void;
}

export function newFeed(
  url: string,
  fields: { title?: string; folder?: string } = {}
): Feed {
  return {
    id: newId(),
    url,
    title: fields.title || undefined,
    folder: fields.folder ?? "",
    errorCount: 0,
    createdAt: new Date(),
  };
}

export function newEntry(feedId: string, parsed: ParsedEntry): Entry {
  return {
    id: newId(),
    feedId,
    guid: parsed.guid,
    title: parsed.title,
    link: parsed.link,
    author: parsed.author,
    content: parsed.content,
    publishedAt: parsed.publishedAt,
    read: false,
    createdAt: new Date(),
  };
}

export function feedDisplayName(feed: Feed): string {
  return feed.title || feed.url;
}

/** Feed ids a filter scopes to, or undefined for all feeds. */
export function filterFeedIds(filter: EntryFilter): string[] | undefined {
  if (filter.feedIds !== undefined) {
    return filter.feedIds;
  }
  return filter.feedId !== undefined ? [filter.feedId] : undefined;
}

/** Newest first; entries without a publication date go last. */
export function compareByPublishedDesc(a: Entry, b: Entry): number {
  const left = a.publishedAt?.getTime();
  const right = b.publishedAt?.getTime();
  if (left === undefined && right === undefined) return 0;
  if (left === undefined) return 1;
  if (right === undefined) return -1;
  return right - left;
}

export function matchesEntryFilter(entry: Entry, filter: EntryFilter): boolean {
  const feedIds = filterFeedIds(filter);
  if (feedIds !== undefined && !feedIds.includes(entry.feedId)) {
    return false;
  }
  if (filter.unreadOnly && entry.read) {
    return false;
  }
  const published = entry.publishedAt?.getTime();
  if (filter.since !== undefined) {
    if (published === undefined || published < filter.since.getTime()) {
      return false;
    }
  }
  if (filter.until !== undefined) {
    if (published === undefined || published >= filter.until.getTime()) {
      return false;
    }
  }
  return true;
}

export function paginate<T>(items: T[], filter: EntryFilter): T[] {
  const offset = Math.max(0, filter.offset ?? 0);
  const end =
    filter.limit !== undefined && filter.limit > 0
      ? offset + filter.limit
      : undefined;
  return items.slice(offset, end);
}

/** Filters, sorts and paginates an in-memory entry list. */
export function applyEntryFilter(entries: Entry[], filter: EntryFilter): Entry[] {
  return paginate(
    entries
      .filter((entry) => matchesEntryFilter(entry, filter))
      .sort(compareByPublishedDesc),
    filter
  );
}

/**
 * Exact id first, then an id prefix; shared by both backends so lookup
 * errors read the same.
 */
export function lookupByIdOrPrefix<T>(
  byId: (id: string) => T,
  byPrefix: (prefix: string) => T,
  ref: string
): T {
  try {
    return byId(ref);
  } catch (err) {
    if (!isFeedkeeperError(err, "NotFound")) {
      throw err;
    }
  }
  return byPrefix(ref);
}

export function duplicateUrl(url: string): FeedkeeperError {
  return new FeedkeeperError("DuplicateURL", `feed already exists: ${url}`);
}

export function duplicateEntry(feedId: string, guid: string): FeedkeeperError {
  return new FeedkeeperError(
    "DuplicateEntry",
    `entry with guid "${guid}" already exists in feed ${feedId}`
  );
}
