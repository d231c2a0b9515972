import { FeedkeeperError, describeError, isFeedkeeperError } from "../helpers/errors";
import { createLogger } from "../helpers/logger";
import { Feed, ParsedFeed } from "../types";
import FeedFetcher from "./FeedFetcher";
import FeedFinder from "./FeedFinder";
import FeedParser from "./FeedParser";
import { Store, feedDisplayName, newEntry, newFeed } from "./Store";

const pino = createLogger("FeedUpdater");

export type FeedUpdateStatus = "new" | "cached" | "error";

export interface FeedUpdateResult {
  feed: Feed;
  status: FeedUpdateStatus;
  newEntries: number;
  error?: string;
}

export interface UpdateSummary {
  total: number;
  newEntries: number;
  cached: number;
  errors: number;
  results: FeedUpdateResult[];
}

export interface UpdateFeedOptions {
  // skip the stored validators and fetch unconditionally
  force?: boolean;
  signal?: AbortSignal;
}

export interface UpdateFeedsOptions extends UpdateFeedOptions {
  // only the feed subscribed under exactly this URL
  url?: string;
  onResult?: (result: FeedUpdateResult) => void;
}

export interface SubscribeOptions {
  folder?: string;
  title?: string;
  // take the URL as the feed URL without probing it
  discover?: boolean;
  signal?: AbortSignal;
}

export interface FeedUpdaterDependencies {
  fetcher?: FeedFetcher;
  parser?: FeedParser;
  finder?: FeedFinder;
  now?: () => Date;
}

/**
 * Runs the ingestion pipeline: fetch, parse, dedupe by guid, store. Feeds
 * are processed one at a time; one failing feed never stops a batch.
 */
export default class FeedUpdater {
  public isUpdateInProgress = false;

  private readonly fetcher: FeedFetcher;

  private readonly parser: FeedParser;

  private readonly finder: FeedFinder;

  private readonly now: () => Date;

  constructor(
    private readonly store: Store,
    dependencies: FeedUpdaterDependencies = {}
  ) {
    this.fetcher = dependencies.fetcher ?? new FeedFetcher();
    this.parser = dependencies.parser ?? new FeedParser();
    this.finder = dependencies.finder ?? new FeedFinder(this.fetcher, this.parser);
    this.now = dependencies.now ?? (() => new Date());
  }

  public async subscribe(inputUrl: string, options: SubscribeOptions = {}): Promise<Feed> {
    let url = FeedFetcher.parseTargetUrl(inputUrl).href;
    let title = options.title;

    if (options.discover !== false) {
      const discovered = await this.finder.discover(inputUrl, { signal: options.signal });
      url = discovered.url;
      title = title || discovered.title;
      pino.debug({ inputUrl, url }, "Feed discovered");
    }

    const feed = newFeed(url, { title, folder: options.folder });
    this.store.createFeed(feed);
    pino.info({ id: feed.id, url }, "Subscribed to feed");
    return feed;
  }

  /**
   * Fetches one feed and stores the entries it has not seen yet. Fetch
   * and parse failures are recorded on the feed, then re-thrown.
   */
  public async updateFeed(
    feedId: string,
    options: UpdateFeedOptions = {}
  ): Promise<FeedUpdateResult> {
    const feed = this.store.getFeed(feedId);
    const validators = options.force
      ? {}
      : { etag: feed.etag, lastModified: feed.lastModified };

    const result = await this.recordFailure(feed, () =>
      this.fetcher.fetchFeed(feed.url, { ...validators, signal: options.signal })
    );

    if (result.status === "not_modified") {
      this.store.updateFeedFetchState(feed.id, feed.etag, feed.lastModified, this.now());
      pino.debug({ url: feed.url }, "Feed not modified");
      return { feed: this.store.getFeed(feed.id), status: "cached", newEntries: 0 };
    }
    const { body, etag, lastModified } = result;

    const parsed = await this.recordFailure(feed, async () => {
      try {
        return this.parser.parse(body);
      } catch (err) {
        throw new FeedkeeperError(
          "ParseError",
          `failed to parse feed: ${describeError(err)}`,
          { cause: err }
        );
      }
    });

    const newEntries = this.store.transaction(() => {
      const created = this.storeNewEntries(feed, parsed);
      this.store.updateFeedFetchState(feed.id, etag, lastModified, this.now());
      if (!feed.title && parsed.title) {
        this.store.updateFeed({ ...this.store.getFeed(feed.id), title: parsed.title });
      }
      return created;
    });

    pino.debug({ url: feed.url, newEntries }, "Feed updated");
    return { feed: this.store.getFeed(feed.id), status: "new", newEntries };
  }

  /** Updates every feed, or the one subscribed under `options.url`. */
  public async updateFeeds(options: UpdateFeedsOptions = {}): Promise<UpdateSummary> {
    if (this.isUpdateInProgress) {
      pino.warn("Update already in progress, skipping this update");
      return { total: 0, newEntries: 0, cached: 0, errors: 0, results: [] };
    }

    this.isUpdateInProgress = true;
    try {
      const feeds =
        options.url === undefined
          ? this.store.listFeeds()
          : [this.store.getFeedByUrl(options.url)];

      const summary: UpdateSummary = {
        total: feeds.length,
        newEntries: 0,
        cached: 0,
        errors: 0,
        results: [],
      };

      for (const feed of feeds) {
        options.signal?.throwIfAborted();

        const outcome = await this.updateOne(feed, options);
        summary.results.push(outcome);
        options.onResult?.(outcome);
        if (outcome.status === "cached") {
          summary.cached += 1;
        } else if (outcome.status === "error") {
          summary.errors += 1;
        } else {
          summary.newEntries += outcome.newEntries;
        }
      }

      pino.info(
        {
          total: summary.total,
          newEntries: summary.newEntries,
          cached: summary.cached,
          errors: summary.errors,
        },
        "Feed update complete"
      );
      return summary;
    } finally {
      this.isUpdateInProgress = false;
    }
  }

  private async updateOne(
    feed: Feed,
    options: UpdateFeedOptions
  ): Promise<FeedUpdateResult> {
    try {
      return await this.updateFeed(feed.id, options);
    } catch (err) {
      if (options.signal?.aborted) {
        throw err;
      }
      pino.warn({ err, url: feed.url }, `Updating ${feedDisplayName(feed)} failed`);
      return {
        feed,
        status: "error",
        newEntries: 0,
        error: describeError(err),
      };
    }
  }

  /** Runs a fetch or parse step, recording its failure on the feed. */
  private async recordFailure<T>(feed: Feed, step: () => Promise<T>): Promise<T> {
    try {
      return await step();
    } catch (err) {
      if (isFeedkeeperError(err)) {
        this.store.updateFeedError(feed.id, err.message);
      }
      throw err;
    }
  }

  private storeNewEntries(feed: Feed, parsed: ParsedFeed): number {
    let created = 0;
    for (const parsedEntry of parsed.entries) {
      if (this.store.entryExists(feed.id, parsedEntry.guid)) {
        continue;
      }
      this.store.createEntry(newEntry(feed.id, parsedEntry));
      created += 1;
    }
    return created;
  }
}
