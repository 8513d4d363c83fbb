import type { ContentType, NewsItem, Severity, Vulnerability } from "@shared/types/intel";

export function cveScore(cve: Vulnerability): number {
  return cve.cvssScore * 0.6 + cve.intrigue * 0.4;
}

// Array.prototype.sort is stable, so equal scores keep their input order
function rankBy<T>(items: T[], score: (item: T) => number): T[] {
  return [...items].sort((a, b) => score(b) - score(a));
}

export interface RankedResults {
  cves: Vulnerability[];
  news: NewsItem[];
}

/**
 * Ranks each category and caps it. With "both" each category gets
 * floor(maxResults / 2) and a short category is not backfilled from the other.
 */
export function rankAndCap(
  cves: Vulnerability[],
  news: NewsItem[],
  contentType: ContentType,
  maxResults: number,
): RankedResults {
  const rankedCves = rankBy(cves, cveScore);
  const rankedNews = rankBy(news, (item) => item.intrigue);

  switch (contentType) {
    case "cve":
      return { cves: rankedCves.slice(0, maxResults), news: [] };
    case "news":
      return { cves: [], news: rankedNews.slice(0, maxResults) };
    case "both": {
      const half = Math.floor(maxResults / 2);
      return { cves: rankedCves.slice(0, half), news: rankedNews.slice(0, half) };
    }
  }
}

/** Drops records older than the cutoff and CVEs outside the severity allow-list (empty = all). */
export function filterForQuery(
  cves: Vulnerability[],
  news: NewsItem[],
  severity: Severity[],
  cutoff: Date,
): RankedResults {
  const allowed = new Set(severity.map((s) => s.toUpperCase()));
  return {
    cves: cves.filter(
      (cve) => cve.publishedDate >= cutoff && (allowed.size === 0 || allowed.has(cve.severity.toUpperCase())),
    ),
    news: news.filter((item) => item.publishedDate >= cutoff),
  };
}

/** First occurrence of a url wins. */
export function mergeByUrl<T extends { url: string }>(...lists: T[][]): T[] {
  const seen = new Set<string>();
  const merged: T[] = [];
  for (const list of lists) {
    for (const item of list) {
      const key = item.url.trim();
      if (seen.has(key)) continue;
      seen.add(key);
      merged.push(item);
    }
  }
  return merged;
}
