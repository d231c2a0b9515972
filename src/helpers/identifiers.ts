import { v4 as uuidv4 } from "uuid";
import { AmbiguousPrefixError, FeedkeeperError, notFound } from "./errors";

export const MIN_PREFIX_LENGTH = 6;

export function newId(): string {
  return uuidv4();
}

export function assertPrefixLength(prefix: string): void {
  if (prefix.length < MIN_PREFIX_LENGTH) {
    throw new FeedkeeperError(
      "PrefixTooShort",
      `prefix "${prefix}" is too short: at least ${MIN_PREFIX_LENGTH} characters required`
    );
  }
}

/**
 * Resolves the outcome of a prefix search: exactly one match wins, none
 * is NotFound, several are AmbiguousPrefix.
 */
export function pickSingleMatch<T>(
  what: string,
  prefix: string,
  matches: T[]
): T {
  if (matches.length === 0) {
    throw notFound(what, prefix);
  }
  if (matches.length > 1) {
    throw new AmbiguousPrefixError(prefix, matches.length);
  }
  return matches[0];
}
