import fs from "fs";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { log, errorMessage } from "backend/utils/log";
import { ConfigurationError } from "backend/utils/errors";
import type { Article } from "@shared/types/intel";

const SOURCE = "scrapers";

export interface ScraperAdapter {
  readonly name: string;
  readonly language: string;
  /** Never expected to throw; a failure is an empty list. */
  scrape(limit: number): Promise<Article[]>;
}

const feedSourceSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  language: z.string().min(2).max(10),
  fetchArticleBody: z.boolean().default(false),
});

export type FeedSource = z.infer<typeof feedSourceSchema>;

export function loadFeedSources(
  file: URL = new URL("../sources.json", import.meta.url),
): FeedSource[] {
  const parsed = z.array(feedSourceSchema).safeParse(JSON.parse(fs.readFileSync(file, "utf8")));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid feed sources: ${fromZodError(parsed.error).message}`);
  }
  return parsed.data;
}

/** Per-source target for a query asking for maxResults items. */
export function perSourceLimit(maxResults: number): number {
  return Math.max(Math.floor(maxResults / 3), 2);
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Runs every adapter at once, each bounded by the timeout. A timed-out or
 * failing adapter contributes nothing. Urls are trimmed and deduplicated.
 */
export async function runScrapers(
  adapters: ScraperAdapter[],
  limitPerSource: number,
  timeoutMs: number,
): Promise<Article[]> {
  const results = await Promise.all(
    adapters.map(async (adapter) => {
      try {
        return await withTimeout(adapter.scrape(limitPerSource), timeoutMs, `Scraper ${adapter.name}`);
      } catch (error) {
        log(`Scraper ${adapter.name} failed: ${errorMessage(error)}`, SOURCE, "error");
        return [];
      }
    }),
  );

  const seen = new Set<string>();
  const articles: Article[] = [];
  for (const article of results.flat()) {
    const url = article.url.trim();
    if (!url || seen.has(url)) continue;
    seen.add(url);
    articles.push({ ...article, url });
  }

  log(`Scraped ${articles.length} articles from ${adapters.length} sources`, SOURCE);
  return articles;
}
