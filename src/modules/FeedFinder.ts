import { JSDOM } from "jsdom";
import { FeedkeeperError, isFeedkeeperError } from "../helpers/errors";
import { createLogger } from "../helpers/logger";
import { DiscoveredFeed } from "../types";
import FeedFetcher, { FetchResult } from "./FeedFetcher";
import FeedParser from "./FeedParser";

const pino = createLogger("FeedFinder");

const feedContentTypes = [
  "application/x-rss+xml",
  "application/rss+xml",
  "application/atom+xml",
  "application/xml",
  "text/xml",
];

const htmlContentTypes = ["text/html", "application/xhtml+xml"];

const commonFeedPaths = ["/feed.xml", "/rss.xml", "/atom.xml", "/index.xml"];

const XML_START = /^<(?:\?xml|rss[\s>]|feed[\s>]|rdf:rdf[\s>])/i;
const HTML_START = /^<(?:!doctype html|html[\s>])/i;

export interface DiscoverOptions {
  signal?: AbortSignal;
}

interface DirectAttempt {
  feed?: DiscoveredFeed;
  html?: { body: string; url: string };
}

function mediaType(contentType: string | undefined): string | undefined {
  const type = contentType?.split(";")[0].trim().toLowerCase();
  return type || undefined;
}

function leadingText(body: Buffer): string {
  return body.subarray(0, 512).toString("utf8").replace(/^\uFEFF/, "").trimStart();
}

/**
 * Finds the feed behind a URL: the URL itself, a feed advertised by the
 * page it serves, or a feed at one of a few conventional paths.
 */
export default class FeedFinder {
  constructor(
    private readonly fetcher: FeedFetcher = new FeedFetcher(),
    private readonly parser: FeedParser = new FeedParser()
  ) {}

  static isFeedContentType(contentType: string | undefined): boolean {
    const type = mediaType(contentType);
    return type !== undefined && feedContentTypes.includes(type);
  }

  static isHtmlContentType(contentType: string | undefined): boolean {
    const type = mediaType(contentType);
    return type !== undefined && htmlContentTypes.includes(type);
  }

  /**
   * `<link rel="alternate">` feed candidates in document order, resolved
   * against the page URL or its `<base href>`.
   */
  static extractFeedLinks(html: string, pageUrl: string): DiscoveredFeed[] {
    const dom = new JSDOM(html, { url: pageUrl });
    try {
      const { document } = dom.window;
      const found: DiscoveredFeed[] = [];

      document.querySelectorAll("link").forEach((link) => {
        const rel = (link.getAttribute("rel") ?? "").toLowerCase().split(/\s+/);
        const href = link.getAttribute("href")?.trim();
        if (!rel.includes("alternate") || !href) {
          return;
        }
        if (!FeedFinder.isFeedContentType(link.getAttribute("type") ?? undefined)) {
          return;
        }

        let resolved: URL;
        try {
          resolved = new URL(href, document.baseURI);
        } catch (err) {
          pino.debug({ err, href }, "Skipping unresolvable feed link");
          return;
        }
        if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
          return;
        }

        found.push({
          url: resolved.href,
          title: link.getAttribute("title")?.trim() || undefined,
        });
      });

      return found;
    } finally {
      dom.window.close();
    }
  }

  /** Conventional feed locations at the site root. */
  static commonPathCandidates(inputUrl: URL): string[] {
    return commonFeedPaths.map((feedPath) => `${inputUrl.origin}${feedPath}`);
  }

  public async discover(
    inputUrl: string,
    options: DiscoverOptions = {}
  ): Promise<DiscoveredFeed> {
    const target = FeedFetcher.parseTargetUrl(inputUrl);

    const direct = await this.tryDirect(inputUrl, options);
    if (direct.feed) {
      return direct.feed;
    }

    if (direct.html) {
      const candidates = FeedFinder.extractFeedLinks(direct.html.body, direct.html.url);
      pino.debug({ url: inputUrl, candidates: candidates.length }, "Feed links found");

      for (const candidate of candidates) {
        const feed = await this.tryFeed(candidate.url, options);
        if (feed) {
          return { url: feed.url, title: feed.title || candidate.title };
        }
      }
    }

    for (const candidate of FeedFinder.commonPathCandidates(target)) {
      const feed = await this.tryFeed(candidate, options);
      if (feed) {
        return feed;
      }
    }

    throw new FeedkeeperError("NoFeedFound", `no RSS or Atom feed found at ${inputUrl}`);
  }

  private async tryDirect(inputUrl: string, options: DiscoverOptions): Promise<DirectAttempt> {
    let result: FetchResult;
    try {
      result = await this.fetcher.fetchFeed(inputUrl, { signal: options.signal });
    } catch (err) {
      if (
        !isFeedkeeperError(err) ||
        err.kind === "InvalidURL" ||
        err.kind === "PrivateAddressBlocked"
      ) {
        throw err;
      }
      pino.debug({ err, url: inputUrl }, "Direct fetch failed");
      return {};
    }

    if (result.status !== "fresh") {
      return {};
    }

    const lead = leadingText(result.body);
    const typeKnown = mediaType(result.contentType) !== undefined;
    const looksLikeFeed =
      FeedFinder.isFeedContentType(result.contentType) ||
      (!FeedFinder.isHtmlContentType(result.contentType) && XML_START.test(lead));

    if (looksLikeFeed) {
      try {
        const parsed = this.parser.parse(result.body);
        return { feed: { url: inputUrl, title: parsed.title } };
      } catch (err) {
        pino.debug({ err, url: inputUrl }, "Input URL is not a feed");
      }
    }

    const looksLikeHtml =
      FeedFinder.isHtmlContentType(result.contentType) ||
      (!typeKnown && HTML_START.test(lead));
    if (looksLikeHtml) {
      return { html: { body: result.body.toString("utf8"), url: result.finalUrl } };
    }
    return {};
  }

  /** Fetches and parses a candidate; any failure means "not this one". */
  private async tryFeed(
    url: string,
    options: DiscoverOptions
  ): Promise<DiscoveredFeed | undefined> {
    try {
      const result = await this.fetcher.fetchFeed(url, { signal: options.signal });
      if (result.status !== "fresh") {
        return undefined;
      }
      const parsed = this.parser.parse(result.body);
      return { url, title: parsed.title };
    } catch (err) {
      if (!isFeedkeeperError(err)) {
        throw err;
      }
      pino.debug({ err, url }, "Feed candidate rejected");
      return undefined;
    }
  }
}
