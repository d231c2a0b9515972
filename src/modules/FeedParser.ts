import crypto from "crypto";
import { decodeHTML } from "entities";
import { XMLParser } from "fast-xml-parser";
import { FeedkeeperError } from "../helpers/errors";
import { parseFeedDate } from "../helpers/feedDates";
import { createLogger } from "../helpers/logger";
import { ParsedEntry, ParsedFeed } from "../types";

const pino = createLogger("FeedParser");

const TEXT_NODE = "#text";
const ATTRIBUTE_PREFIX = "@_";

/**
 * Atom content and summary are kept raw so that xhtml markup survives;
 * everything else goes through the parser's own text handling.
 */
const parserOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_NODE,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  processEntities: true,
  htmlEntities: true,
  removeNSPrefix: false,
  stopNodes: ["feed.entry.content", "feed.entry.summary"],
};

const XML_DECLARATION_ENCODING =
  /^\s*<\?xml[^>]*\sencoding\s*=\s*["']([A-Za-z0-9._-]+)["']/;

// --- tree access over the untyped parser output ---

function isNode(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function child(node: unknown, name: string): unknown {
  return isNode(node) ? node[name] : undefined;
}

function children(node: unknown, name: string): unknown[] {
  const value = child(node, name);
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function firstChild(node: unknown, name: string): unknown {
  return children(node, name)[0];
}

function attribute(node: unknown, name: string): string | undefined {
  const value = child(node, `${ATTRIBUTE_PREFIX}${name}`);
  return typeof value === "string" ? value.trim() || undefined : undefined;
}

/** Text content of a leaf element, whether or not it carries attributes. */
function textOf(node: unknown): string | undefined {
  if (typeof node === "string") {
    return node.trim() || undefined;
  }
  if (typeof node === "number" || typeof node === "boolean") {
    return String(node);
  }
  if (Array.isArray(node)) {
    return textOf(node[0]);
  }
  if (!isNode(node)) {
    return undefined;
  }
  return textOf(node[TEXT_NODE]);
}

function childText(node: unknown, name: string): string | undefined {
  return textOf(firstChild(node, name));
}

/** Decodes entities outside CDATA sections; CDATA text is taken literally. */
function decodeRawText(raw: string): string {
  const cdataSection = /<!\[CDATA\[([\s\S]*?)\]\]>/g;
  let decoded = "";
  let last = 0;
  let match: RegExpExecArray | null;
  while ((match = cdataSection.exec(raw)) !== null) {
    decoded += decodeHTML(raw.slice(last, match.index)) + match[1];
    last = match.index + match[0].length;
  }
  return decoded + decodeHTML(raw.slice(last));
}

/**
 * Atom text constructs read as stop nodes: xhtml keeps its markup, other
 * types are unwrapped from CDATA and entity-decoded.
 */
function atomTextConstruct(node: unknown): string | undefined {
  const raw = textOf(node);
  if (raw === undefined) {
    return undefined;
  }
  if (attribute(node, "type") === "xhtml") {
    return raw;
  }
  return decodeRawText(raw).trim() || undefined;
}

function fallbackGuid(title: string | undefined, rawDate: string | undefined) {
  const digest = crypto
    .createHash("sha256")
    .update(`${title ?? ""}\n${rawDate ?? ""}`)
    .digest("hex");
  return `sha256:${digest.slice(0, 32)}`;
}

export function detectCharset(bytes: Buffer): string {
  const head = bytes.subarray(0, 200).toString("latin1");
  const match = XML_DECLARATION_ENCODING.exec(head);
  return match ? match[1].toLowerCase() : "utf-8";
}

export function decodeFeedBytes(bytes: Buffer): string {
  const charset = detectCharset(bytes);
  try {
    return new TextDecoder(charset).decode(bytes);
  } catch (err) {
    pino.debug({ charset, err }, "Unknown charset, decoding as utf-8");
    return new TextDecoder("utf-8").decode(bytes);
  }
}

/**
 * Turns RSS 2.0, RSS 1.0 and Atom 1.0 documents into one dialect-free
 * shape. Entries missing optional fields are kept; an undecodable date
 * only drops that entry's timestamp.
 */
export default class FeedParser {
  private xmlParser: XMLParser;

  constructor() {
    this.xmlParser = new XMLParser(parserOptions);
  }

  public parse(body: Buffer | string): ParsedFeed {
    const xml = typeof body === "string" ? body : decodeFeedBytes(body);

    let document: unknown;
    try {
      document = this.xmlParser.parse(xml);
    } catch (err) {
      throw new FeedkeeperError("ParseError", "feed is not well-formed XML", {
        cause: err,
      });
    }

    const rss = child(document, "rss");
    if (rss !== undefined) {
      const channel = firstChild(rss, "channel");
      if (!isNode(channel)) {
        throw new FeedkeeperError("ParseError", "RSS document has no channel");
      }
      return this.parseRss(channel, children(channel, "item"));
    }

    const rdf = child(document, "rdf:RDF");
    if (isNode(rdf)) {
      return this.parseRss(firstChild(rdf, "channel"), children(rdf, "item"));
    }

    const atom = child(document, "feed");
    if (isNode(atom)) {
      return this.parseAtom(atom);
    }

    throw new FeedkeeperError(
      "ParseError",
      "document is neither an RSS nor an Atom feed"
    );
  }

  private parseRss(channel: unknown, items: unknown[]): ParsedFeed {
    const entries = items.map((item): ParsedEntry => {
      const title = childText(item, "title");
      const link = childText(item, "link");
      const rawDate = childText(item, "pubDate") ?? childText(item, "dc:date");

      return {
        guid: childText(item, "guid") ?? link ?? fallbackGuid(title, rawDate),
        title,
        link,
        author: childText(item, "author") ?? childText(item, "dc:creator"),
        publishedAt: parseFeedDate(rawDate),
        content:
          childText(item, "content:encoded") ?? childText(item, "description"),
      };
    });

    pino.debug({ entries: entries.length }, "Parsed RSS document");
    return { title: childText(channel, "title"), entries };
  }

  private parseAtom(feed: Record<string, unknown>): ParsedFeed {
    const entries = children(feed, "entry").map((entry): ParsedEntry => {
      const title = childText(entry, "title");
      const link = children(entry, "link")
        .filter((candidate) => attribute(candidate, "rel") !== "self")
        .map((candidate) => attribute(candidate, "href"))
        .find((href) => href !== undefined);
      const rawDate =
        childText(entry, "published") ?? childText(entry, "updated");

      return {
        guid: childText(entry, "id") ?? link ?? fallbackGuid(title, rawDate),
        title,
        link,
        author: childText(firstChild(entry, "author"), "name"),
        publishedAt:
          parseFeedDate(childText(entry, "published")) ??
          parseFeedDate(childText(entry, "updated")),
        content:
          atomTextConstruct(firstChild(entry, "content")) ??
          atomTextConstruct(firstChild(entry, "summary")),
      };
    });

    pino.debug({ entries: entries.length }, "Parsed Atom document");
    return { title: childText(feed, "title"), entries };
  }
}
