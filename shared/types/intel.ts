// Domain types shared between the pipeline, storage and API

export type Severity = 'Low' | 'Medium' | 'High' | 'Critical';
export const SEVERITIES: readonly Severity[] = ['Low', 'Medium', 'High', 'Critical'];

export type ContentType = 'cve' | 'news' | 'both';

export type Recommendation = 'sufficient' | 'urgent_scrape';

export const UNKNOWN_CVE_ID = 'Unknown';

export interface Article {
  id?: number;
  source: string;
  url: string;
  title: string;
  titleTranslated?: string;
  content: string;
  contentTranslated?: string;
  language: string;
  scrapedAt: Date;
  publishedDate: Date;
  processed?: boolean;
}

export interface Vulnerability {
  id?: number;
  cveId: string;
  title: string;
  titleTranslated?: string;
  summary: string;
  severity: Severity;
  cvssScore: number;
  intrigue: number;
  publishedDate: Date;
  originalLanguage: string;
  source: string;
  url: string;
  affectedProducts: string[];
  sessionId?: string;
  createdAt?: Date;
}

export interface NewsItem {
  id?: number;
  title: string;
  titleTranslated?: string;
  summary: string;
  intrigue: number;
  publishedDate: Date;
  originalLanguage: string;
  source: string;
  url: string;
  sessionId?: string;
  createdAt?: Date;
}

export type ClassifiedRecord =
  | { kind: 'cve'; record: Vulnerability }
  | { kind: 'news'; record: NewsItem };

export interface ClassificationResult {
  type: 'CVE' | 'News';
  cveId: string[];
  severity: Severity;
  cvssScore: number;
  summary: string;
  intrigue: number;
  affectedProducts: string[];
}

export interface SearchParams {
  contentType: ContentType;
  severity: Severity[];
  daysBack: number;
  maxResults: number;
  sessionId?: string;
}

export interface SufficiencyAnalysis {
  recommendation: Recommendation;
  reasoning: string;
  existingCves: number;
  existingNews: number;
  neededCves: number;
  neededNews: number;
  cutoff: Date;
}

// Wire shapes (snake_case, dates as ISO strings)
export interface VulnerabilityDto {
  cve_id: string;
  title: string;
  title_translated: string | null;
  summary: string;
  severity: Severity;
  cvss_score: number;
  intrigue: number;
  published_date: string;
  original_language: string;
  source: string;
  url: string;
  affected_products: string[];
}

export interface NewsItemDto {
  title: string;
  title_translated: string | null;
  summary: string;
  intrigue: number;
  published_date: string;
  original_language: string;
  source: string;
  url: string;
}

export interface SearchStats {
  scraped_articles: number;
  already_classified: number;
  newly_classified: number;
  classification_failures: number;
}

export interface SearchResponse {
  success: true;
  cves: VulnerabilityDto[];
  news: NewsItemDto[];
  total_results: number;
  session_id: string;
  generated_at: string;
  recommendation: Recommendation;
  reasoning: string;
  stats: SearchStats;
}

export interface SearchFailure {
  success: false;
  error: string;
  session_id?: string;
}

export type SearchOutcome = SearchResponse | SearchFailure;

// Case-insensitive severity match, anything unrecognised is Medium
export function toSeverity(value: unknown): Severity {
  if (typeof value === 'string') {
    const folded = value.trim().toLowerCase();
    const match = SEVERITIES.find((s) => s.toLowerCase() === folded);
    if (match) return match;
  }
  return 'Medium';
}
