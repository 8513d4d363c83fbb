// Fixtures shared by the threat-intel test suites
import { openDatabase, type SqlExecutor } from "backend/db/db";
import type { Article, NewsItem, Vulnerability } from "@shared/types/intel";
import { createIntelStorage, type IIntelStorage } from "./queries/intel-storage";
import type { ScraperAdapter } from "./scrapers";
import type { LlmClient } from "./services/llm";

export const DAY_MS = 24 * 60 * 60 * 1000;

export async function createTestStorage(): Promise<{ db: SqlExecutor; storage: IIntelStorage }> {
  const db = openDatabase({ kind: "sqlite", path: ":memory:" });
  await db.applySchema();
  return { db, storage: createIntelStorage(db) };
}

export function daysBefore(days: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

export function makeCve(overrides: Partial<Vulnerability> = {}): Vulnerability {
  return {
    cveId: "CVE-2024-0001",
    title: "Buffer overflow in example router firmware",
    summary: "A remote attacker can execute code.",
    severity: "High",
    cvssScore: 8.0,
    intrigue: 6,
    publishedDate: daysBefore(1),
    originalLanguage: "en",
    source: "example-feed",
    url: "https://example.test/cve/1",
    affectedProducts: ["Example Router"],
    ...overrides,
  };
}

export function makeNews(overrides: Partial<NewsItem> = {}): NewsItem {
  return {
    title: "Ransomware group targets hospitals",
    summary: "A ransomware campaign hit several hospitals.",
    intrigue: 5,
    publishedDate: daysBefore(1),
    originalLanguage: "en",
    source: "example-feed",
    url: "https://example.test/news/1",
    ...overrides,
  };
}

export const SECURITY_BODY =
  "Researchers disclosed a critical vulnerability in a widely deployed VPN appliance. " +
  "The flaw allows unauthenticated attackers to execute arbitrary code, and an exploit " +
  "is already circulating. Administrators are urged to apply the vendor patch immediately.";

export function makeArticle(overrides: Partial<Article> = {}): Article {
  const now = new Date();
  return {
    source: "example-feed",
    url: "https://example.test/articles/1",
    title: "Critical VPN vulnerability exploited",
    content: SECURITY_BODY,
    language: "en",
    scrapedAt: now,
    publishedDate: daysBefore(1, now),
    ...overrides,
  };
}

export class StaticScraper implements ScraperAdapter {
  calls = 0;

  constructor(
    readonly name: string,
    private readonly articles: Article[],
    readonly language = "en",
  ) {}

  async scrape(limit: number): Promise<Article[]> {
    this.calls++;
    return this.articles.slice(0, limit);
  }
}

export class ScriptedLlm implements LlmClient {
  prompts: string[] = [];

  constructor(private readonly respond: (prompt: string) => string | Promise<string>) {}

  assertReady() {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.respond(prompt);
  }
}
