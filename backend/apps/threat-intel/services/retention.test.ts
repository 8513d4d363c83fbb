import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { SqlExecutor } from "backend/db/db";
import type { IIntelStorage } from "../queries/intel-storage";
import { createTestStorage, daysBefore, makeArticle, makeCve, makeNews } from "../test-helpers";
import { cleanupExpired } from "./retention";

describe("cleanupExpired", () => {
  let db: SqlExecutor;
  let storage: IIntelStorage;

  beforeEach(async () => {
    ({ db, storage } = await createTestStorage());
    await storage.insertCve(makeCve({ url: "old-cve", publishedDate: daysBefore(120) }), "s");
    await storage.insertCve(makeCve({ url: "new-cve", publishedDate: daysBefore(10) }), "s");
    await storage.insertNewsItem(makeNews({ url: "old-news", publishedDate: daysBefore(100) }), "s");
    await storage.insertRawArticle(makeArticle({ url: "old-raw", scrapedAt: daysBefore(95) }), "s");
    await storage.insertRawArticle(makeArticle({ url: "new-raw" }), "s");
  });

  afterEach(async () => {
    await db.close();
  });

  it("only counts on a dry run", async () => {
    const report = await cleanupExpired(storage, { months: 3, dryRun: true });

    expect(report.dryRun).toBe(true);
    expect(report.tables).toEqual([
      { table: "cves", rows: 1 },
      { table: "newsitems", rows: 1 },
      { table: "raw_articles", rows: 1 },
    ]);
    expect(report.totalRows).toBe(3);
    expect(await storage.findCve("old-cve")).not.toBeNull();
  });

  it("deletes rows past the retention window", async () => {
    const now = new Date();
    const report = await cleanupExpired(storage, { months: 3, now });

    expect(report.cutoff).toBe(daysBefore(90, now).toISOString());
    expect(report.totalRows).toBe(3);
    expect(await storage.findCve("old-cve")).toBeNull();
    expect(await storage.findCve("new-cve")).not.toBeNull();
    expect(await storage.findRawArticle("new-raw")).not.toBeNull();

    const again = await cleanupExpired(storage, { months: 3, now });
    expect(again.totalRows).toBe(0);
  });

  it("keeps going when one table fails", async () => {
    const flaky: IIntelStorage = {
      ...storage,
      deleteExpired: async (table, cutoff) => {
        if (table === "newsitems") throw new Error("table locked");
        return storage.deleteExpired(table, cutoff);
      },
    };

    const report = await cleanupExpired(flaky, { months: 3 });

    expect(report.tables).toEqual([
      { table: "cves", rows: 1 },
      { table: "newsitems", rows: 0, error: "table locked" },
      { table: "raw_articles", rows: 1 },
    ]);
    expect(report.totalRows).toBe(2);
  });
});
