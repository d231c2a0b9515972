import axios, { AxiosResponse } from "axios";
import dns from "dns";
import net from "net";
import { isAllowedResolution } from "../helpers/addressPolicy";
import {
  FeedkeeperError,
  UnexpectedStatusError,
  describeError,
  errorCode,
} from "../helpers/errors";
import { createLogger } from "../helpers/logger";
import { VERSION } from "../version";

const pino = createLogger("FeedFetcher");

export const MAX_RESPONSE_SIZE = 10 * 1024 * 1024;
export const REQUEST_TIMEOUT_MS = 30_000;
export const MAX_REDIRECTS = 5;
export const USER_AGENT = `feedkeeper/${VERSION} (RSS reader)`;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export type FetchResult =
  | {
      status: "fresh";
      body: Buffer;
      etag?: string;
      lastModified?: string;
      contentType?: string;
      finalUrl: string;
    }
  | { status: "not_modified"; finalUrl: string };

export interface FetchOptions {
  etag?: string;
  lastModified?: string;
  signal?: AbortSignal;
}

export type HostResolver = (hostname: string) => Promise<string[]>;

export interface FeedFetcherOptions {
  maxResponseSize?: number;
  timeoutMs?: number;
  userAgent?: string;
  resolveHost?: HostResolver;
}

async function resolveWithDns(hostname: string): Promise<string[]> {
  const addresses = await dns.promises.lookup(hostname, { all: true });
  return addresses.map(({ address }) => address);
}

function headerValue(
  headers: AxiosResponse["headers"],
  name: string
): string | undefined {
  const value: unknown = headers[name];
  return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * Formats low-level socket and DNS failures into short messages that fit
 * on one status line.
 */
export function describeNetworkError(err: unknown): string {
  switch (errorCode(err)) {
    case "ENOTFOUND":
      return "domain not found (DNS lookup failed)";
    case "EAI_AGAIN":
      return "DNS lookup timed out";
    case "ECONNREFUSED":
      return "connection refused";
    case "ECONNRESET":
      return "connection reset by server";
    case "ECONNABORTED":
    case "ETIMEDOUT":
      return "request timed out";
    case "EHOSTUNREACH":
      return "host unreachable";
    case "ENETUNREACH":
      return "network unreachable";
    default:
      return describeError(err);
  }
}

/**
 * Conditional GET of a feed document. Stateless apart from its limits.
 * Failures surface as FeedkeeperErrors, except a cancellation through the
 * caller's signal, which rethrows the abort as-is.
 */
export default class FeedFetcher {
  private readonly maxResponseSize: number;

  private readonly timeoutMs: number;

  private readonly userAgent: string;

  private readonly resolveHost: HostResolver;

  constructor(options: FeedFetcherOptions = {}) {
    this.maxResponseSize = options.maxResponseSize ?? MAX_RESPONSE_SIZE;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? USER_AGENT;
    this.resolveHost = options.resolveHost ?? resolveWithDns;
  }

  public async fetchFeed(
    url: string,
    options: FetchOptions = {}
  ): Promise<FetchResult> {
    let currentUrl = url;
    // one deadline for the whole exchange, redirects and body included
    const deadline = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal
      ? AbortSignal.any([options.signal, deadline])
      : deadline;

    for (let redirects = 0; redirects <= MAX_REDIRECTS; redirects += 1) {
      const target = FeedFetcher.parseTargetUrl(currentUrl);
      await this.assertPublicHost(target);

      const response = await this.request(target.href, options, {
        signal,
        deadline,
      });
      pino.debug(
        { url: target.href, status: response.status },
        "Feed response received"
      );

      if (REDIRECT_STATUSES.has(response.status)) {
        const location = headerValue(response.headers, "location");
        if (!location) {
          throw new UnexpectedStatusError(response.status, target.href);
        }
        currentUrl = new URL(location, target).href;
        continue;
      }

      if (response.status === 304) {
        return { status: "not_modified", finalUrl: target.href };
      }

      if (response.status !== 200) {
        throw new UnexpectedStatusError(response.status, target.href);
      }

      return {
        status: "fresh",
        body: Buffer.from(response.data),
        etag: headerValue(response.headers, "etag"),
        lastModified: headerValue(response.headers, "last-modified"),
        contentType: headerValue(response.headers, "content-type"),
        finalUrl: target.href,
      };
    }

    throw new FeedkeeperError(
      "NetworkError",
      `too many redirects (more than ${MAX_REDIRECTS}) from ${url}`
    );
  }

  static parseTargetUrl(raw: string): URL {
    let target: URL;
    try {
      target = new URL(raw);
    } catch (err) {
      throw new FeedkeeperError("InvalidURL", `invalid URL: ${raw}`, {
        cause: err,
      });
    }
    if (target.protocol !== "http:" && target.protocol !== "https:") {
      throw new FeedkeeperError(
        "InvalidURL",
        `unsupported URL scheme "${target.protocol.replace(/:$/, "")}": ${raw}`
      );
    }
    return target;
  }

  private async assertPublicHost(target: URL): Promise<void> {
    const hostname = target.hostname.replace(/^\[|\]$/g, "");

    let addresses: string[];
    if (net.isIP(hostname)) {
      addresses = [hostname];
    } else {
      try {
        addresses = await this.resolveHost(hostname);
      } catch (err) {
        throw new FeedkeeperError(
          "NetworkError",
          `cannot resolve ${hostname}: ${describeNetworkError(err)}`,
          { cause: err }
        );
      }
    }

    if (!isAllowedResolution(addresses)) {
      pino.warn({ hostname, addresses }, "Blocked private address");
      throw new FeedkeeperError(
        "PrivateAddressBlocked",
        `refusing to fetch ${target.href}: host resolves to a private address`
      );
    }
  }

  private async request(
    url: string,
    options: FetchOptions,
    abort: { signal: AbortSignal; deadline: AbortSignal }
  ): Promise<AxiosResponse<ArrayBuffer>> {
    const headers: Record<string, string> = {
      "User-Agent": this.userAgent,
      "Accept-Encoding": "gzip, deflate",
      Accept:
        "application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.9, text/html;q=0.8, */*;q=0.5",
    };
    if (options.etag) {
      headers["If-None-Match"] = options.etag;
    }
    if (options.lastModified) {
      headers["If-Modified-Since"] = options.lastModified;
    }

    try {
      return await axios.get<ArrayBuffer>(url, {
        headers,
        responseType: "arraybuffer",
        maxRedirects: 0,
        maxContentLength: this.maxResponseSize,
        proxy: false,
        signal: abort.signal,
        validateStatus: () => true,
      });
    } catch (err) {
      if (abort.deadline.aborted && !options.signal?.aborted) {
        throw new FeedkeeperError(
          "NetworkError",
          `request to ${url} failed: request timed out after ${this.timeoutMs} ms`,
          { cause: err }
        );
      }
      if (axios.isCancel(err)) {
        throw err;
      }
      if (describeError(err).includes("maxContentLength")) {
        throw new FeedkeeperError(
          "ResponseTooLarge",
          `response from ${url} exceeds ${this.maxResponseSize} bytes`,
          { cause: err }
        );
      }
      throw new FeedkeeperError(
        "NetworkError",
        `request to ${url} failed: ${describeNetworkError(err)}`,
        { cause: err }
      );
    }
  }
}
