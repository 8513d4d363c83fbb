import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { SqlExecutor } from "backend/db/db";
import { createTestStorage, makeArticle, StaticScraper } from "../test-helpers";
import { DedupGate } from "../services/dedup-gate";
import { extractArticleBody, FeedScraper, parseFeed, type FetchLike } from "./feed-scraper";
import { loadFeedSources, perSourceLimit, runScrapers, type ScraperAdapter } from "./index";

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Example feed</title>
    <item>
      <title>First advisory</title>
      <link>https://example.test/a</link>
      <description>&lt;p&gt;Patch   now&lt;/p&gt;</description>
      <pubDate>Mon, 15 Jan 2024 10:30:00 +0000</pubDate>
    </item>
    <item>
      <title>Second advisory</title>
      <link> https://example.test/b </link>
      <description>Plain text</description>
      <pubDate>not a date</pubDate>
    </item>
    <item>
      <title></title>
      <link>https://example.test/untitled</link>
    </item>
  </channel>
</rss>`;

const ATOM = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <entry>
    <title>Atom entry</title>
    <link href="https://example.test/atom/1"/>
    <summary>Summary text</summary>
    <updated>2024-01-15T10:30:00Z</updated>
  </entry>
</feed>`;

function fetchFrom(pages: Record<string, string>): FetchLike {
  return async (url) => {
    const body = pages[url];
    return body === undefined ? new Response("missing", { status: 404 }) : new Response(body, { status: 200 });
  };
}

const source = { name: "example", url: "https://example.test/feed", language: "en", fetchArticleBody: false };

describe("parseFeed", () => {
  it("reads RSS items and skips entries without a title", () => {
    const entries = parseFeed(RSS);
    expect(entries).toEqual([
      {
        title: "First advisory",
        url: "https://example.test/a",
        content: "Patch now",
        published: "Mon, 15 Jan 2024 10:30:00 +0000",
      },
      { title: "Second advisory", url: "https://example.test/b", content: "Plain text", published: "not a date" },
    ]);
  });

  it("reads Atom entries", () => {
    expect(parseFeed(ATOM)).toEqual([
      {
        title: "Atom entry",
        url: "https://example.test/atom/1",
        content: "Summary text",
        published: "2024-01-15T10:30:00Z",
      },
    ]);
  });
});

describe("extractArticleBody", () => {
  it("joins article paragraphs and ignores page chrome", () => {
    const html =
      "<html><body><nav><p>Menu</p></nav><article><p>One</p><p> Two  words </p></article>" +
      "<footer><p>Footer</p></footer></body></html>";
    expect(extractArticleBody(html)).toBe("One\nTwo words");
  });
});

describe("FeedScraper", () => {
  let db: SqlExecutor;
  let gate: DedupGate;

  beforeEach(async () => {
    const created = await createTestStorage();
    db = created.db;
    gate = new DedupGate(created.storage);
    await created.storage.insertRawArticle(makeArticle({ url: "https://example.test/a" }), "earlier");
  });

  afterEach(async () => {
    await db.close();
  });

  it("skips urls that were already scraped and tags the rest", async () => {
    const scraper = new FeedScraper(source, gate, fetchFrom({ [source.url]: RSS }));
    const articles = await scraper.scrape(10);

    expect(articles.map((a) => a.url)).toEqual(["https://example.test/b"]);
    expect(articles[0]).toMatchObject({ source: "example", language: "en", title: "Second advisory" });
    // unparseable pubDate falls back to the scrape time
    expect(articles[0].publishedDate.getTime()).toBe(articles[0].scrapedAt.getTime());
  });

  it("uses the fetched article body when it is longer", async () => {
    const scraper = new FeedScraper(
      { ...source, fetchArticleBody: true },
      null,
      fetchFrom({
        [source.url]: RSS,
        "https://example.test/a": "<article><p>A much longer article body than the feed offers.</p></article>",
      }),
    );
    const articles = await scraper.scrape(1);

    expect(articles).toHaveLength(1);
    expect(articles[0].content).toBe("A much longer article body than the feed offers.");
    expect(articles[0].publishedDate.toISOString()).toBe("2024-01-15T10:30:00.000Z");
  });

  it("returns nothing when the feed cannot be fetched", async () => {
    const scraper = new FeedScraper(source, null, fetchFrom({}));
    expect(await scraper.scrape(5)).toEqual([]);
  });
});

describe("runScrapers", () => {
  it("isolates failing and slow adapters and dedups urls", async () => {
    const failing: ScraperAdapter = {
      name: "failing",
      language: "en",
      scrape: async () => {
        throw new Error("boom");
      },
    };
    const slow: ScraperAdapter = {
      name: "slow",
      language: "en",
      scrape: () => new Promise(() => {}),
    };
    const one = new StaticScraper("one", [makeArticle({ url: " https://example.test/x " }), makeArticle({ url: "https://example.test/y" })]);
    const two = new StaticScraper("two", [makeArticle({ url: "https://example.test/x" })]);

    const articles = await runScrapers([failing, slow, one, two], 5, 50);

    expect(articles.map((a) => a.url)).toEqual(["https://example.test/x", "https://example.test/y"]);
  });

  it("passes the per-source limit through", async () => {
    const adapter = new StaticScraper("one", [
      makeArticle({ url: "u1" }),
      makeArticle({ url: "u2" }),
      makeArticle({ url: "u3" }),
    ]);
    expect(await runScrapers([adapter], 2, 1000)).toHaveLength(2);
  });

  it("asks each source for a third of the results, at least two", () => {
    expect(perSourceLimit(30)).toBe(10);
    expect(perSourceLimit(4)).toBe(2);
  });
});

describe("loadFeedSources", () => {
  it("reads the bundled source list", () => {
    const sources = loadFeedSources();
    expect(sources.length).toBeGreaterThan(0);
    expect(new Set(sources.map((s) => s.language))).toEqual(new Set(["en", "ru", "zh"]));
  });
});
