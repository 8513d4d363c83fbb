import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { sql } from "drizzle-orm";
import type { SqlExecutor } from "backend/db/db";
import { createTestStorage, daysBefore, makeArticle, makeCve, makeNews } from "../test-helpers";
import type { IIntelStorage } from "./intel-storage";

describe("intel storage (sqlite)", () => {
  let db: SqlExecutor;
  let storage: IIntelStorage;

  beforeEach(async () => {
    ({ db, storage } = await createTestStorage());
  });

  afterEach(async () => {
    await db.close();
  });

  describe("raw articles", () => {
    it("inserts once per url and ignores duplicates", async () => {
      const article = makeArticle({ url: "  https://example.test/a  " });
      expect(await storage.insertRawArticle(article, "s1")).toBe(true);
      expect(await storage.insertRawArticle(article, "s2")).toBe(false);

      const stored = await storage.findRawArticle("https://example.test/a");
      expect(stored?.url).toBe("https://example.test/a");
      expect(stored?.title).toBe(article.title);
      expect(stored?.processed).toBe(false);
      expect(stored?.publishedDate.toISOString()).toBe(article.publishedDate.toISOString());
    });

    it("tracks the processed flag", async () => {
      await storage.insertRawArticle(makeArticle({ url: "https://example.test/a" }), "s1");
      await storage.insertRawArticle(makeArticle({ url: "https://example.test/b" }), "s1");
      await storage.markAsProcessed("https://example.test/a");

      const backlog = await storage.getUnprocessedArticles(10);
      expect(backlog.map((a) => a.url)).toEqual(["https://example.test/b"]);
    });
  });

  describe("classified records", () => {
    it("round trips a CVE including affected products", async () => {
      const cve = makeCve({ affectedProducts: ["Router X", "Router Y"] });
      expect(await storage.insertCve(cve, "session-a")).toBe(true);
      expect(await storage.insertCve(cve, "session-b")).toBe(false);

      const stored = await storage.findCve(cve.url);
      expect(stored).toMatchObject({
        cveId: "CVE-2024-0001",
        severity: "High",
        cvssScore: 8.0,
        intrigue: 6,
        affectedProducts: ["Router X", "Router Y"],
        sessionId: "session-a",
      });
      expect(stored?.publishedDate.toISOString()).toBe(cve.publishedDate.toISOString());
    });

    it("round trips a news item", async () => {
      const news = makeNews();
      expect(await storage.insertNewsItem(news, "session-a")).toBe(true);
      expect(await storage.insertNewsItem(news, "session-a")).toBe(false);
      expect((await storage.findNewsItem(news.url))?.intrigue).toBe(5);
      expect(await storage.findNewsItem("https://example.test/missing")).toBeNull();
    });
  });

  describe("range queries", () => {
    beforeEach(async () => {
      await storage.insertCve(makeCve({ url: "u1", severity: "Critical", cvssScore: 9.8, intrigue: 9 }), "s");
      await storage.insertCve(makeCve({ url: "u2", severity: "High", cvssScore: 7.5, intrigue: 4 }), "s");
      await storage.insertCve(makeCve({ url: "u3", severity: "Low", cvssScore: 2.0, intrigue: 1 }), "s");
      await storage.insertCve(makeCve({ url: "u4", severity: "High", cvssScore: 8.0, intrigue: 8, publishedDate: daysBefore(20) }), "s");
      await storage.insertNewsItem(makeNews({ url: "n1", intrigue: 3 }), "s");
      await storage.insertNewsItem(makeNews({ url: "n2", intrigue: 7 }), "s");
    });

    it("filters by severity case-insensitively and by date", async () => {
      // Older rows were written with lower-case severities
      await db.run(sql`UPDATE cves SET severity = 'high' WHERE url = 'u2'`);
      const since = daysBefore(7);
      expect(await storage.countCves({ severity: ["High", "Critical"], since, limit: 100 })).toBe(2);
      expect((await storage.findCve("u2"))?.severity).toBe("High");
      expect(await storage.countCves({ severity: [], since, limit: 100 })).toBe(3);
      expect(await storage.countCves({ severity: [], since: daysBefore(30), limit: 100 })).toBe(4);
    });

    it("caps counts at the limit", async () => {
      expect(await storage.countCves({ severity: [], since: daysBefore(30), limit: 2 })).toBe(2);
      expect(await storage.countNews({ since: daysBefore(7), limit: 1 })).toBe(1);
    });

    it("orders CVEs by blended score and news by intrigue", async () => {
      const cves = await storage.getCves({ severity: ["Critical", "High", "Low"], since: daysBefore(7), limit: 10 });
      expect(cves.map((c) => c.url)).toEqual(["u1", "u2", "u3"]);

      const news = await storage.getNews({ since: daysBefore(7), limit: 1 });
      expect(news.map((n) => n.url)).toEqual(["n2"]);
    });
  });

  describe("sessions and statistics", () => {
    it("groups items by session", async () => {
      await storage.insertCve(makeCve({ url: "u1" }), "alpha");
      await storage.insertNewsItem(makeNews({ url: "n1" }), "alpha");
      await storage.insertNewsItem(makeNews({ url: "n2" }), "beta");

      const alpha = await storage.getItemsBySession("alpha", 50);
      expect(alpha.total_cves).toBe(1);
      expect(alpha.total_news).toBe(1);

      const recent = await storage.getRecentSessions(24);
      const counts = Object.fromEntries(recent.map((s) => [s.session_id, [s.cve_count, s.news_count]]));
      expect(counts).toEqual({ alpha: [1, 1], beta: [0, 1] });
    });

    it("reports averages and scrape times", async () => {
      await storage.insertCve(makeCve({ url: "u1", cvssScore: 9, intrigue: 8 }), "s");
      await storage.insertCve(makeCve({ url: "u2", cvssScore: 7, intrigue: 4 }), "s");
      await storage.insertRawArticle(makeArticle({ url: "a1", source: "Feed-One" }), "s");

      const stats = await storage.getDataStatistics();
      expect(stats.cves).toEqual({ count: 2, avg_cvss: 8, avg_intrigue: 6 });
      expect(stats.news).toEqual({ count: 0, avg_intrigue: 0 });
      expect(stats.raw_articles).toEqual({ count: 1, unprocessed: 1, last_24h: 1 });

      const times = await storage.getLastScrapeTimes();
      expect(Object.keys(times)).toEqual(["feed-one"]);
    });
  });

  describe("retention", () => {
    it("counts and deletes rows older than the cutoff", async () => {
      await storage.insertCve(makeCve({ url: "old", publishedDate: daysBefore(120) }), "s");
      await storage.insertCve(makeCve({ url: "new", publishedDate: daysBefore(2) }), "s");

      const cutoff = daysBefore(90);
      expect(await storage.countExpired("cves", cutoff)).toBe(1);
      expect(await storage.deleteExpired("cves", cutoff)).toBe(1);
      expect(await storage.findCve("old")).toBeNull();
      expect(await storage.findCve("new")).not.toBeNull();
    });
  });
});
