import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { SqlExecutor } from "backend/db/db";
import type { IIntelStorage } from "../queries/intel-storage";
import { createTestStorage, makeArticle, ScriptedLlm, StaticScraper } from "../test-helpers";
import { Classifier } from "./classifier";
import { DedupGate } from "./dedup-gate";
import { FreshnessAnalyzer } from "./freshness-analyzer";
import { IntelPipeline } from "./intel-pipeline";
import { OpenAiLlmClient, type LlmClient } from "./llm";
import { IntelScheduler, SCHEDULE_PRESETS } from "./scheduler";
import { OpenAiTranslator } from "./translator";

const CVE_ANSWER = JSON.stringify({
  type: "CVE",
  cve_id: ["CVE-2024-3333"],
  severity: "Critical",
  cvss_score: 9.1,
  summary: "Remote code execution.",
  intrigue: 8,
  affected_products: ["Gateway"],
});

describe("IntelScheduler", () => {
  let db: SqlExecutor;
  let storage: IIntelStorage;

  beforeEach(async () => {
    ({ db, storage } = await createTestStorage());
  });

  afterEach(async () => {
    await db.close();
  });

  function createScheduler(llm: LlmClient) {
    const analyzer = new FreshnessAnalyzer(storage);
    const scraper = new StaticScraper("feed", [
      makeArticle({ url: "https://example.test/gateway", publishedDate: new Date() }),
    ]);
    const pipeline = new IntelPipeline({
      storage,
      gate: new DedupGate(storage),
      analyzer,
      classifier: new Classifier(llm),
      translator: new OpenAiTranslator(llm),
      scrapers: [scraper],
      settings: { classificationWorkers: 2, translationWorkers: 2, scraperTimeoutMs: 1000 },
    });
    const scheduler = new IntelScheduler(pipeline, analyzer, storage, {
      scheduleType: "testing",
      cacheFreshnessHours: 12,
      retentionMonths: 3,
    });
    return { scheduler, scraper };
  }

  it("uses the documented presets", () => {
    expect(SCHEDULE_PRESETS.production.cron).toBe("0 */6 * * *");
    expect(SCHEDULE_PRESETS.production.params).toEqual({ contentType: "both", severity: [], daysBack: 3, maxResults: 30 });
    expect(SCHEDULE_PRESETS.testing.params).toEqual({
      contentType: "both",
      severity: ["Critical", "High"],
      daysBack: 1,
      maxResults: 15,
    });
  });

  it("runs the preset search when the cache is stale", async () => {
    const { scheduler } = createScheduler(new ScriptedLlm(() => CVE_ANSWER));
    const now = new Date();

    const outcome = await scheduler.runRefresh(now);

    expect(outcome).toEqual({ status: "completed", sessionId: `cron_${now.getTime()}`, totalResults: 1 });
    expect((await storage.findCve("https://example.test/gateway"))?.sessionId).toBe(`cron_${now.getTime()}`);
  });

  it("skips while the cache is fresh", async () => {
    await storage.insertRawArticle(makeArticle({ url: "https://example.test/recent" }), "earlier");
    const { scheduler, scraper } = createScheduler(new ScriptedLlm(() => CVE_ANSWER));

    expect(await scheduler.runRefresh()).toEqual({ status: "skipped", reason: "cache is fresh" });
    expect(scraper.calls).toBe(0);
  });

  it("skips a tick while the previous one is still running", async () => {
    const { scheduler } = createScheduler(new ScriptedLlm(() => CVE_ANSWER));

    const first = scheduler.runRefresh();
    const second = await scheduler.runRefresh();

    expect(second).toEqual({ status: "skipped", reason: "already running" });
    expect((await first).status).toBe("completed");
  });

  it("reports a failed search", async () => {
    const { scheduler } = createScheduler(
      new OpenAiLlmClient(null, { model: "gpt-4o-mini", timeoutMs: 1000, maxTokens: 100 }),
    );

    expect(await scheduler.runRefresh()).toEqual({ status: "failed", error: "OpenAI API key not configured" });
  });
});
