import { isFatalError } from "backend/utils/errors";
import { log, errorMessage } from "backend/utils/log";
import {
  UNKNOWN_CVE_ID,
  type Article,
  type ClassificationResult,
  type ClassifiedRecord,
  type SearchOutcome,
  type SearchParams,
} from "@shared/types/intel";
import type { IIntelStorage } from "../queries/intel-storage";
import { createProgressReporter, type ProgressChannel, type ProgressReporter } from "../progress";
import { perSourceLimit, runScrapers, type ScraperAdapter } from "../scrapers";
import { classifyMany, prepareClassificationBatch, type TextClassifier } from "./classification-orchestrator";
import type { DedupGate } from "./dedup-gate";
import { neededCounts, type FreshnessAnalyzer } from "./freshness-analyzer";
import { filterForQuery, mergeByUrl, rankAndCap, type RankedResults } from "./ranking";
import { newSession, type IntelSession } from "./session";
import { translateArticlesParallel, truncateText, type Translator } from "./translator";

const SOURCE = "intel-pipeline";

export interface PipelineSettings {
  classificationWorkers: number;
  translationWorkers: number;
  scraperTimeoutMs: number;
}

export interface PipelineDeps {
  storage: IIntelStorage;
  gate: DedupGate;
  analyzer: FreshnessAnalyzer;
  classifier: TextClassifier & { assertReady(): void };
  translator: Translator;
  scrapers: ScraperAdapter[];
  progress?: ProgressChannel | null;
  settings: PipelineSettings;
  now?: () => Date;
}

/**
 * Turns one article and its classification results into storable records.
 * The first record keeps the article url; further records from the same
 * article are keyed "<url>#<cveId>" (or "<url>#news") so url stays unique.
 */
export function buildRecords(article: Article, results: ClassificationResult[]): ClassifiedRecord[] {
  const records: ClassifiedRecord[] = [];
  const baseUrl = article.url.trim();
  const seen = new Set<string>();

  const nextUrl = (suffix: string) => (records.length === 0 ? baseUrl : `${baseUrl}#${suffix}`);
  const shared = {
    title: article.title,
    titleTranslated: article.titleTranslated,
    publishedDate: article.publishedDate,
    originalLanguage: article.language,
    source: article.source,
  };

  for (const result of results) {
    if (result.type === "CVE") {
      for (const cveId of result.cveId) {
        if (cveId === UNKNOWN_CVE_ID || seen.has(cveId)) continue;
        seen.add(cveId);
        records.push({
          kind: "cve",
          record: {
            ...shared,
            cveId,
            summary: result.summary,
            severity: result.severity,
            cvssScore: result.cvssScore,
            intrigue: result.intrigue,
            url: nextUrl(cveId),
            affectedProducts: result.affectedProducts,
          },
        });
      }
    } else if (!seen.has("news")) {
      seen.add("news");
      records.push({
        kind: "news",
        record: { ...shared, summary: result.summary, intrigue: result.intrigue, url: nextUrl("news") },
      });
    }
  }

  return records;
}

export class IntelPipeline {
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async search(params: SearchParams): Promise<SearchOutcome> {
    const session = newSession(params.sessionId);
    const report = createProgressReporter(this.deps.progress ?? null, session.sessionId);
    const startTime = Date.now();

    log(
      `[${session.sessionId}] Search: ${params.contentType}, severity [${params.severity.join(", ")}], ` +
        `${params.daysBack} days, max ${params.maxResults}`,
      SOURCE,
    );

    try {
      report("analyzing", "Checking stored intelligence", 10);
      const analysis = await this.deps.analyzer.analyze(params);

      const ranked =
        analysis.recommendation === "sufficient"
          ? await this.retrieveExisting(params, analysis.cutoff)
          : await this.refresh(session, params, analysis.cutoff, report);

      report("completed", `Found ${ranked.cves.length} CVEs and ${ranked.news.length} news items`, 100);
      log(`[${session.sessionId}] Search finished in ${Date.now() - startTime}ms`, SOURCE);
      return session.toResponse(ranked, analysis, this.now());
    } catch (error) {
      const message = errorMessage(error);
      const kind = isFatalError(error) ? "Search failed" : "Search failed unexpectedly";
      log(`[${session.sessionId}] ${kind}: ${message}`, SOURCE, "error");
      report("error", message, 100);
      return { success: false, error: message, session_id: session.sessionId };
    }
  }

  private async retrieveExisting(params: SearchParams, cutoff: Date): Promise<RankedResults> {
    const { storage } = this.deps;
    const needed = neededCounts(params.contentType, params.maxResults);
    const cves = needed.cves > 0
      ? await storage.getCves({ severity: params.severity, since: cutoff, limit: needed.cves })
      : [];
    const news = needed.news > 0 ? await storage.getNews({ since: cutoff, limit: needed.news }) : [];
    return rankAndCap(cves, news, params.contentType, params.maxResults);
  }

  /**
   * Scrape, translate, persist and classify, then merge the new records with
   * what storage already holds and rank the lot.
   */
  private async refresh(
    session: IntelSession,
    params: SearchParams,
    cutoff: Date,
    report: ProgressReporter,
  ): Promise<RankedResults> {
    const { storage, gate, settings } = this.deps;
    this.deps.classifier.assertReady();

    report("scraping", "Scraping sources", 25);
    const scraped = await runScrapers(this.deps.scrapers, perSourceLimit(params.maxResults), settings.scraperTimeoutMs);

    const fresh: Article[] = [];
    for (const article of scraped) {
      const existing = await gate.getClassified(article.url);
      if (existing) {
        session.addAlreadyClassified([existing]);
        continue;
      }
      if (await gate.isScraped(article.url)) continue;
      fresh.push({ ...article, content: truncateText(article.content, article.language) });
    }
    session.scrapedArticles.push(...fresh);

    const backlog = await storage.getUnprocessedArticles(params.maxResults * 2);
    const candidates = mergeByUrl(fresh, backlog).filter((article) => article.scrapedAt >= cutoff);
    log(`[${session.sessionId}] ${fresh.length} new articles, ${backlog.length} in backlog`, SOURCE);

    report("translating", `Translating ${candidates.length} articles`, 50);
    await translateArticlesParallel(candidates, this.deps.translator, settings.translationWorkers);

    for (const article of fresh) {
      await storage.insertRawArticle(article, session.sessionId);
    }

    report("classifying", `Classifying ${candidates.length} articles`, 75);
    const prepared = await prepareClassificationBatch(candidates, gate);
    session.addAlreadyClassified(prepared.alreadyClassified);

    const batch = await classifyMany(this.deps.classifier, prepared.items, settings.classificationWorkers);
    session.classificationFailures = batch.failed;

    for (const outcome of batch.outcomes) {
      if (!outcome.success) continue;
      for (const classified of buildRecords(candidates[outcome.index], outcome.results)) {
        if (classified.kind === "cve") {
          if (await storage.insertCve(classified.record, session.sessionId)) {
            session.classifiedCves.push(classified.record);
          }
        } else if (await storage.insertNewsItem(classified.record, session.sessionId)) {
          session.classifiedNews.push(classified.record);
        }
      }
    }

    // Every attempt is terminal, including skips and failures
    for (const article of candidates) {
      await storage.markAsProcessed(article.url);
    }

    report("ranking", "Ranking results", 90);
    const limit = params.maxResults * 3;
    const storedCves = await storage.getCves({ severity: params.severity, since: cutoff, limit });
    const storedNews = await storage.getNews({ since: cutoff, limit });

    const filtered = filterForQuery(
      mergeByUrl(session.classifiedCves, session.existingCves(), storedCves),
      mergeByUrl(session.classifiedNews, session.existingNews(), storedNews),
      params.severity,
      cutoff,
    );
    return rankAndCap(filtered.cves, filtered.news, params.contentType, params.maxResults);
  }
}
