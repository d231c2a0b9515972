import fs from "fs";
import os from "os";
import path from "path";
import { newId } from "../helpers/identifiers";
import { Entry, Feed } from "../types";

export function makeTempDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `feedkeeper-${label}-`));
}

export function makeFeed(url: string, overrides: Partial<Feed> = {}): Feed {
  return {
    id: newId(),
    url,
    folder: "",
    errorCount: 0,
    createdAt: new Date("2024-01-01T00:00:00.000Z"),
    ...overrides,
  };
}

export function makeEntry(
  feedId: string,
  guid: string,
  overrides: Partial<Entry> = {}
): Entry {
  return {
    id: newId(),
    feedId,
    guid,
    title: `Entry ${guid}`,
    read: false,
    createdAt: new Date("2024-01-02T00:00:00.000Z"),
    ...overrides,
  };
}

/** Random id starting with `prefix`, for prefix collision tests. */
export function idWithPrefix(prefix: string): string {
  return `${prefix}${newId().slice(prefix.length)}`;
}
