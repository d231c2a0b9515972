import { isFeedkeeperError } from "../helpers/errors";
import { startTestServer, TestServer } from "../testing/startTestServer";
import FeedFinder from "./FeedFinder";

const rss = (title?: string) =>
  `<?xml version="1.0"?><rss version="2.0"><channel>${
    title ? `<title>${title}</title>` : ""
  }<item><guid>1</guid></item></channel></rss>`;

const atom = (title: string) =>
  `<?xml version="1.0"?><feed xmlns="http://www.w3.org/2005/Atom"><title>${title}</title></feed>`;

const page = (head: string) =>
  `<!DOCTYPE html><html><head>${head}</head><body><p>Hello</p></body></html>`;

async function discoveryError(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    return isFeedkeeperError(err) ? err.kind : "unexpected";
  }
  return "none";
}

describe("FeedFinder", () => {
  let server: TestServer;
  let fallbackSite: TestServer;
  const requested: string[] = [];

  beforeAll(async () => {
    server = await startTestServer((app) => {
      app.use((req, _res, next) => {
        requested.push(req.path);
        next();
      });
      app.get("/site.xml", (_req, res) => {
        res.type("application/rss+xml").send(rss("Site Feed"));
      });
      app.get("/blog/", (_req, res) => {
        res.type("html").send(
          page(`
            <link rel="stylesheet" href="/style.css">
            <link rel="alternate" type="application/atom+xml" href="../broken.xml" title="Broken">
            <link rel="alternate" type="application/rss+xml" href="feeds/main.xml" title="Main feed">
            <link rel="alternate" type="application/rss+xml" href="/site.xml" title="Second">
          `)
        );
      });
      app.get("/blog/feeds/main.xml", (_req, res) => {
        res.type("text/xml").send(rss());
      });
      app.get("/with-base", (_req, res) => {
        res.type("html").send(
          page(`<base href="/assets/"><link rel="alternate" type="application/rss+xml" href="rss.xml">`)
        );
      });
      app.get("/assets/rss.xml", (_req, res) => {
        res.type("application/rss+xml").send(rss("Assets"));
      });
      app.get("/no-type", (_req, res) => {
        res.end(rss("Untyped"));
      });
      app.get("/bad-xml", (_req, res) => {
        res.type("application/xml").send("<rss><channel>");
      });
    });
    fallbackSite = await startTestServer((app) => {
      app.use((req, _res, next) => {
        requested.push(req.path);
        next();
      });
      app.get("/blog/post.html", (_req, res) => {
        res.type("html").send(page("<title>No feeds here</title>"));
      });
      app.get("/atom.xml", (_req, res) => {
        res.type("application/atom+xml").send(atom("Fallback"));
      });
    });
  });

  afterAll(async () => {
    await server.stop();
    await fallbackSite.stop();
  });

  beforeEach(() => {
    requested.length = 0;
  });

  describe("discover", () => {
    it("returns a URL that already serves a feed", async () => {
      const finder = new FeedFinder();

      const feed = await finder.discover(`${server.baseUrl}/site.xml`);

      expect(feed).toEqual({ url: `${server.baseUrl}/site.xml`, title: "Site Feed" });
      expect(requested).toEqual(["/site.xml"]);
    });

    it("follows the first working alternate link in document order", async () => {
      const finder = new FeedFinder();

      const feed = await finder.discover(`${server.baseUrl}/blog/`);

      expect(feed).toEqual({
        url: `${server.baseUrl}/blog/feeds/main.xml`,
        title: "Main feed",
      });
      expect(requested).toEqual(["/blog/", "/broken.xml", "/blog/feeds/main.xml"]);
    });

    it("resolves links against the document base", async () => {
      const finder = new FeedFinder();

      const feed = await finder.discover(`${server.baseUrl}/with-base`);

      expect(feed).toEqual({ url: `${server.baseUrl}/assets/rss.xml`, title: "Assets" });
    });

    it("tries common paths at the site root as a last resort", async () => {
      const finder = new FeedFinder();

      const feed = await finder.discover(`${fallbackSite.baseUrl}/blog/post.html?page=2`);

      expect(feed).toEqual({
        url: `${fallbackSite.baseUrl}/atom.xml`,
        title: "Fallback",
      });
      expect(requested).toEqual(["/blog/post.html", "/feed.xml", "/rss.xml", "/atom.xml"]);
    });

    it("accepts an XML body served without a content type", async () => {
      const finder = new FeedFinder();

      const feed = await finder.discover(`${server.baseUrl}/no-type`);

      expect(feed).toEqual({ url: `${server.baseUrl}/no-type`, title: "Untyped" });
    });

    it("gives up with NoFeedFound once every strategy fails", async () => {
      const finder = new FeedFinder();

      expect(await discoveryError(finder.discover(`${server.baseUrl}/bad-xml`))).toBe(
        "NoFeedFound"
      );
      expect(await discoveryError(finder.discover(`${server.baseUrl}/gone`))).toBe(
        "NoFeedFound"
      );
    });

    it("rejects invalid and private URLs before probing", async () => {
      const finder = new FeedFinder();

      expect(await discoveryError(finder.discover("not a url"))).toBe("InvalidURL");
      expect(await discoveryError(finder.discover("ftp://example.com/feed"))).toBe(
        "InvalidURL"
      );
      expect(await discoveryError(finder.discover("http://10.1.2.3/feed.xml"))).toBe(
        "PrivateAddressBlocked"
      );
      expect(requested).toEqual([]);
    });
  });

  describe("extractFeedLinks", () => {
    it("keeps feed-typed alternate links with absolute http URLs", () => {
      const html = page(`
        <link rel="Alternate" type="application/rss+xml; charset=utf-8" href="/a.xml" title=" A ">
        <link rel="alternate nofollow" type="application/atom+xml" href="https://other.example/b.xml">
        <link rel="alternate" type="text/html" href="/c.html">
        <link rel="alternate" type="application/rss+xml" href="javascript:void(0)">
        <link rel="icon" type="application/rss+xml" href="/d.xml">
        <link rel="alternate" type="application/rss+xml">
      `);

      expect(FeedFinder.extractFeedLinks(html, "https://example.com/posts/1")).toEqual([
        { url: "https://example.com/a.xml", title: "A" },
        { url: "https://other.example/b.xml", title: undefined },
      ]);
    });

    it("resolves path-relative and parent links", () => {
      const html = page(`
        <link rel="alternate" type="application/rss+xml" href="feed">
        <link rel="alternate" type="application/rss+xml" href="../up.xml">
      `);

      expect(
        FeedFinder.extractFeedLinks(html, "https://example.com/a/b/page").map(({ url }) => url)
      ).toEqual(["https://example.com/a/b/feed", "https://example.com/a/up.xml"]);
    });
  });

  describe("commonPathCandidates", () => {
    it("uses the origin for a root URL", () => {
      expect(FeedFinder.commonPathCandidates(new URL("https://example.com/"))).toEqual([
        "https://example.com/feed.xml",
        "https://example.com/rss.xml",
        "https://example.com/atom.xml",
        "https://example.com/index.xml",
      ]);
    });

    it("drops the path and query of a deep URL", () => {
      expect(
        FeedFinder.commonPathCandidates(
          new URL("https://example.com:8443/blog/2024/post.html?x=1")
        )
      ).toEqual([
        "https://example.com:8443/feed.xml",
        "https://example.com:8443/rss.xml",
        "https://example.com:8443/atom.xml",
        "https://example.com:8443/index.xml",
      ]);
    });
  });

  it("recognises feed and HTML content types", () => {
    expect(FeedFinder.isFeedContentType("application/atom+xml; charset=utf-8")).toBe(true);
    expect(FeedFinder.isFeedContentType("TEXT/XML")).toBe(true);
    expect(FeedFinder.isFeedContentType("text/html")).toBe(false);
    expect(FeedFinder.isFeedContentType(undefined)).toBe(false);
    expect(FeedFinder.isHtmlContentType("text/html; charset=utf-8")).toBe(true);
  });
});
