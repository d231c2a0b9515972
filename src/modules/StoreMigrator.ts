import fs from "fs";
import { StorageError, errorCode } from "../helpers/errors";
import { createLogger } from "../helpers/logger";
import { Store } from "./Store";

const pino = createLogger("StoreMigrator");

export interface MigrationSummary {
  feeds: number;
  entries: number;
}

/**
 * Copies every feed, then its entries, from `source` into `destination`,
 * ids and timestamps included. The destination is expected to be empty;
 * anything already there surfaces as DuplicateURL or DuplicateEntry.
 */
export function migrateData(source: Store, destination: Store): MigrationSummary {
  const summary: MigrationSummary = { feeds: 0, entries: 0 };

  for (const feed of source.listFeeds()) {
    const entries = source.listEntries({ feedId: feed.id });

    try {
      destination.transaction(() => {
        destination.createFeed(feed);
        for (const entry of entries) {
          destination.createEntry(entry);
        }
      });
    } catch (err) {
      pino.error({ err, feedId: feed.id, url: feed.url }, "Feed migration failed");
      throw err;
    }

    summary.feeds += 1;
    summary.entries += entries.length;
    pino.debug({ url: feed.url, entries: entries.length }, "Feed migrated");
  }

  pino.info(summary, "Migration complete");
  return summary;
}

/** False for a missing or empty directory. */
export function isDirNonEmpty(dirPath: string): boolean {
  try {
    return fs.readdirSync(dirPath).length > 0;
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return false;
    }
    throw new StorageError(`cannot read directory ${dirPath}`, err);
  }
}
