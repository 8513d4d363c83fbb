import { log } from "backend/utils/log";
import type { ContentType, Severity, SufficiencyAnalysis } from "@shared/types/intel";
import type { IIntelStorage } from "../queries/intel-storage";
import { daysAgo } from "./date-normalizer";

const SOURCE = "freshness";

export interface AnalyzeParams {
  contentType: ContentType;
  severity: Severity[];
  daysBack: number;
  maxResults: number;
}

export interface CacheFreshness {
  isFresh: boolean;
  lastScrape: Date | null;
  ageHours: number | null;
  thresholdHours: number;
  sources: Record<string, { lastScrape: string; ageHours: number }>;
}

export function neededCounts(contentType: ContentType, maxResults: number) {
  switch (contentType) {
    case "cve":
      return { cves: maxResults, news: 0 };
    case "news":
      return { cves: 0, news: maxResults };
    case "both": {
      const cves = Math.floor(maxResults / 2);
      return { cves, news: maxResults - cves };
    }
  }
}

const HOUR_MS = 60 * 60 * 1000;

export class FreshnessAnalyzer {
  constructor(
    private readonly storage: IIntelStorage,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Decides whether stored rows can answer the query. Strictly binary: any
   * shortfall in either category means a fresh scrape.
   */
  async analyze(params: AnalyzeParams): Promise<SufficiencyAnalysis> {
    const cutoff = daysAgo(params.daysBack, this.now());
    const needed = neededCounts(params.contentType, params.maxResults);

    const existingCves = needed.cves > 0
      ? await this.storage.countCves({ severity: params.severity, since: cutoff, limit: needed.cves })
      : 0;
    const existingNews = needed.news > 0
      ? await this.storage.countNews({ since: cutoff, limit: needed.news })
      : 0;

    const sufficient = existingCves >= needed.cves && existingNews >= needed.news;
    const reasoning = sufficient
      ? `Found ${existingCves}/${needed.cves} CVEs and ${existingNews}/${needed.news} news items in database`
      : `Need ${needed.cves} CVEs and ${needed.news} news items, only have ${existingCves} CVEs and ${existingNews} news items`;

    log(`${sufficient ? "sufficient" : "urgent_scrape"}: ${reasoning}`, SOURCE);

    return {
      recommendation: sufficient ? "sufficient" : "urgent_scrape",
      reasoning,
      existingCves,
      existingNews,
      neededCves: needed.cves,
      neededNews: needed.news,
      cutoff,
    };
  }

  /** Fresh iff the newest scrape across all sources is younger than the threshold. */
  async checkCacheFreshness(thresholdHours = 12): Promise<CacheFreshness> {
    const now = this.now();
    const times = await this.storage.getLastScrapeTimes();

    const sources: CacheFreshness["sources"] = {};
    let lastScrape: Date | null = null;
    for (const [source, time] of Object.entries(times)) {
      sources[source] = {
        lastScrape: time.toISOString(),
        ageHours: (now.getTime() - time.getTime()) / HOUR_MS,
      };
      if (!lastScrape || time > lastScrape) lastScrape = time;
    }

    if (!lastScrape) {
      log("No previous scrape found, cache is stale", SOURCE);
      return { isFresh: false, lastScrape: null, ageHours: null, thresholdHours, sources };
    }

    const ageHours = (now.getTime() - lastScrape.getTime()) / HOUR_MS;
    const isFresh = ageHours < thresholdHours;
    log(`Cache age ${ageHours.toFixed(1)}h (threshold ${thresholdHours}h): ${isFresh ? "fresh" : "stale"}`, SOURCE);

    return { isFresh, lastScrape, ageHours, thresholdHours, sources };
  }
}
