import { v4 as uuidv4 } from "uuid";
import type {
  Article,
  ClassifiedRecord,
  NewsItem,
  NewsItemDto,
  SearchResponse,
  SearchStats,
  SufficiencyAnalysis,
  Vulnerability,
  VulnerabilityDto,
} from "@shared/types/intel";
import type { RankedResults } from "./ranking";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** YYYYMMDD_HHMMSS_xxxxxxxx, UTC. */
export function generateSessionId(now: Date = new Date()): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${date}_${time}_${uuidv4().slice(0, 8)}`;
}

export function toVulnerabilityDto(cve: Vulnerability): VulnerabilityDto {
  return {
    cve_id: cve.cveId,
    title: cve.title,
    title_translated: cve.titleTranslated ?? null,
    summary: cve.summary,
    severity: cve.severity,
    cvss_score: cve.cvssScore,
    intrigue: cve.intrigue,
    published_date: cve.publishedDate.toISOString(),
    original_language: cve.originalLanguage,
    source: cve.source,
    url: cve.url,
    affected_products: cve.affectedProducts,
  };
}

export function toNewsItemDto(item: NewsItem): NewsItemDto {
  return {
    title: item.title,
    title_translated: item.titleTranslated ?? null,
    summary: item.summary,
    intrigue: item.intrigue,
    published_date: item.publishedDate.toISOString(),
    original_language: item.originalLanguage,
    source: item.source,
    url: item.url,
  };
}

/**
 * Per-query working set. Created at the start of a search and dropped once
 * the response is built; nothing here outlives the request.
 */
export class IntelSession {
  readonly scrapedArticles: Article[] = [];
  readonly classifiedCves: Vulnerability[] = [];
  readonly classifiedNews: NewsItem[] = [];
  readonly alreadyClassifiedArticles: ClassifiedRecord[] = [];
  classificationFailures = 0;

  constructor(readonly sessionId: string) {}

  addAlreadyClassified(records: ClassifiedRecord[]) {
    this.alreadyClassifiedArticles.push(...records);
  }

  existingCves(): Vulnerability[] {
    return this.alreadyClassifiedArticles.flatMap((r) => (r.kind === "cve" ? [r.record] : []));
  }

  existingNews(): NewsItem[] {
    return this.alreadyClassifiedArticles.flatMap((r) => (r.kind === "news" ? [r.record] : []));
  }

  stats(): SearchStats {
    return {
      scraped_articles: this.scrapedArticles.length,
      already_classified: this.alreadyClassifiedArticles.length,
      newly_classified: this.classifiedCves.length + this.classifiedNews.length,
      classification_failures: this.classificationFailures,
    };
  }

  toResponse(ranked: RankedResults, analysis: SufficiencyAnalysis, now: Date = new Date()): SearchResponse {
    return {
      success: true,
      cves: ranked.cves.map(toVulnerabilityDto),
      news: ranked.news.map(toNewsItemDto),
      total_results: ranked.cves.length + ranked.news.length,
      session_id: this.sessionId,
      generated_at: now.toISOString(),
      recommendation: analysis.recommendation,
      reasoning: analysis.reasoning,
      stats: this.stats(),
    };
  }
}

// session_id columns are VARCHAR(50)
export function newSession(sessionId?: string): IntelSession {
  return new IntelSession(sessionId?.trim().slice(0, 50) || generateSessionId());
}
