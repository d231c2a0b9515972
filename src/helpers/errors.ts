export type ErrorKind =
  | "InvalidURL"
  | "PrivateAddressBlocked"
  | "NetworkError"
  | "UnexpectedStatus"
  | "ResponseTooLarge"
  | "ParseError"
  | "NoFeedFound"
  | "DuplicateURL"
  | "DuplicateEntry"
  | "NotFound"
  | "AmbiguousPrefix"
  | "PrefixTooShort"
  | "StorageError";

/**
 * Base error for everything the ingestion pipeline and the stores raise.
 * `kind` is the stable, matchable part; the message is for humans.
 */
export class FeedkeeperError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "FeedkeeperError";
  }
}

export class UnexpectedStatusError extends FeedkeeperError {
  constructor(
    public readonly statusCode: number,
    public readonly url: string
  ) {
    super("UnexpectedStatus", `unexpected status ${statusCode} from ${url}`);
    this.name = "UnexpectedStatusError";
  }
}

export class AmbiguousPrefixError extends FeedkeeperError {
  constructor(
    public readonly prefix: string,
    public readonly matchCount: number
  ) {
    super(
      "AmbiguousPrefix",
      `prefix "${prefix}" is ambiguous: ${matchCount} matches`
    );
    this.name = "AmbiguousPrefixError";
  }
}

export class StorageError extends FeedkeeperError {
  constructor(message: string, cause: unknown) {
    super("StorageError", `${message}: ${describeError(cause)}`, { cause });
    this.name = "StorageError";
  }
}

export function isFeedkeeperError(
  err: unknown,
  kind?: ErrorKind
): err is FeedkeeperError {
  return (
    err instanceof FeedkeeperError && (kind === undefined || err.kind === kind)
  );
}

export function notFound(what: string, ref: string): FeedkeeperError {
  return new FeedkeeperError("NotFound", `${what} not found: ${ref}`);
}

// Node core errors are not `instanceof Error` inside Jest's module sandbox,
// so errors are read by shape.
export function describeError(err: unknown): string {
  if (
    typeof err === "object" &&
    err !== null &&
    "message" in err &&
    typeof err.message === "string"
  ) {
    return err.message;
  }
  return String(err);
}

/** The `code` of a system or driver error (`ENOENT`, `SQLITE_CONSTRAINT_UNIQUE`). */
export function errorCode(err: unknown): string | undefined {
  return typeof err === "object" &&
    err !== null &&
    "code" in err &&
    typeof err.code === "string"
    ? err.code
    : undefined;
}

/** Unusable configuration file; not part of the pipeline's error kinds. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
