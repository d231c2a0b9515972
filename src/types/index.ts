export interface Feed {
  id: string;
  url: string;
  title?: string;
  folder: string;
  etag?: string;
  lastModified?: string;
  lastFetchedAt?: Date;
  lastError?: string;
  errorCount: number;
  createdAt: Date;
}

export interface Entry {
  id: string;
  feedId: string;
  guid: string;
  title?: string;
  link?: string;
  author?: string;
  content?: string;
  publishedAt?: Date;
  read: boolean;
  readAt?: Date;
  createdAt: Date;
}

export interface EntryFilter {
  feedId?: string;
  // takes precedence over feedId when both are set
  feedIds?: string[];
  unreadOnly?: boolean;
  since?: Date;
  until?: Date;
  limit?: number;
  offset?: number;
}

export interface FeedStats {
  feedId: string;
  feedUrl: string;
  feedTitle?: string;
  lastFetchedAt?: Date;
  lastError?: string;
  errorCount: number;
  entryCount: number;
  unreadCount: number;
}

export interface OverallStats {
  totalFeeds: number;
  totalEntries: number;
  unreadCount: number;
}

export interface ParsedEntry {
  guid: string;
  title?: string;
  link?: string;
  author?: string;
  publishedAt?: Date;
  content?: string;
}

export interface ParsedFeed {
  title?: string;
  entries: ParsedEntry[];
}

export interface DiscoveredFeed {
  url: string;
  title?: string;
}

export type BackendName = "sqlite" | "markdown";
