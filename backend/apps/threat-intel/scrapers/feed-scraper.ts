import * as cheerio from "cheerio";
import { log, errorMessage } from "backend/utils/log";
import type { Article } from "@shared/types/intel";
import { normalizeDateForArticle } from "../services/date-normalizer";
import type { DedupGate } from "../services/dedup-gate";
import type { FeedSource, ScraperAdapter } from "./index";

const SOURCE = "feed-scraper";

const DEFAULT_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Accept: "application/rss+xml,application/atom+xml,application/xml;q=0.9,text/html;q=0.8,*/*;q=0.5",
  "Accept-Language": "en-US,en;q=0.9,ru;q=0.8,zh;q=0.7",
};

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface FeedEntry {
  title: string;
  url: string;
  content: string;
  published: string;
}

function htmlToText(html: string): string {
  if (!html.includes("<")) return html.trim();
  return cheerio.load(html).root().text().replace(/\s+/g, " ").trim();
}

/** Reads RSS 2.0 items and Atom entries. */
export function parseFeed(xml: string): FeedEntry[] {
  const $ = cheerio.load(xml, { xml: true });
  const entries: FeedEntry[] = [];

  $("item, entry").each((_, el) => {
    const node = $(el);
    const title = htmlToText(node.find("title").first().text());
    const link = node.find("link").first();
    const url = (link.attr("href") || link.text() || node.find("guid").first().text()).trim();
    const body =
      node.find("content\\:encoded").first().text() ||
      node.find("content").first().text() ||
      node.find("description").first().text() ||
      node.find("summary").first().text();
    const published =
      node.find("pubDate").first().text() ||
      node.find("published").first().text() ||
      node.find("updated").first().text() ||
      node.find("dc\\:date").first().text();

    if (title && url) {
      entries.push({ title, url, content: htmlToText(body), published: published.trim() });
    }
  });

  return entries;
}

// Paragraph text of an article page
export function extractArticleBody(html: string): string {
  const $ = cheerio.load(html);
  $("script, style, nav, header, footer, aside").remove();
  const scope = $("article").length > 0 ? $("article").first() : $("body");
  const paragraphs = scope
    .find("p")
    .map((_, p) => $(p).text().replace(/\s+/g, " ").trim())
    .get()
    .filter((text) => text.length > 0);
  return paragraphs.join("\n");
}

export class FeedScraper implements ScraperAdapter {
  readonly name: string;
  readonly language: string;

  constructor(
    private readonly source: FeedSource,
    private readonly gate: DedupGate | null = null,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly requestTimeoutMs = 20_000,
  ) {
    this.name = source.name;
    this.language = source.language;
  }

  private async fetchText(url: string): Promise<string> {
    const response = await this.fetchImpl(url, {
      headers: DEFAULT_HEADERS,
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} for ${url}`);
    }
    return response.text();
  }

  async scrape(limit: number): Promise<Article[]> {
    let entries: FeedEntry[];
    try {
      entries = parseFeed(await this.fetchText(this.source.url));
    } catch (error) {
      log(`[${this.name}] Feed fetch failed: ${errorMessage(error)}`, SOURCE, "error");
      return [];
    }

    const articles: Article[] = [];
    for (const entry of entries) {
      if (articles.length >= limit) break;

      const url = entry.url.trim();
      if (this.gate && (await this.gate.isScraped(url))) {
        log(`[${this.name}] Already scraped: ${url}`, SOURCE, "debug");
        continue;
      }

      let content = entry.content;
      if (this.source.fetchArticleBody) {
        try {
          const body = extractArticleBody(await this.fetchText(url));
          if (body.length > content.length) content = body;
        } catch (error) {
          log(`[${this.name}] Article fetch failed for ${url}: ${errorMessage(error)}`, SOURCE, "warn");
        }
      }

      const scrapedAt = new Date();
      articles.push({
        source: this.name,
        url,
        title: entry.title,
        content,
        language: this.language,
        scrapedAt,
        publishedDate: normalizeDateForArticle(entry.published, scrapedAt),
      });
    }

    log(`[${this.name}] Scraped ${articles.length} articles`, SOURCE);
    return articles;
  }
}
