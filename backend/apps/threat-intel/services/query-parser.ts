import { SEVERITIES, type ContentType, type SearchParams, type Severity } from "@shared/types/intel";

export const MAX_RESULTS_CAP = 50;

const DEFAULTS = { daysBack: 7, maxResults: 10 };

/**
 * Reads search parameters out of a free-text request such as
 * "critical cves from the last 2 weeks, 20 results".
 */
export function parseQuery(text: string): SearchParams {
  const lower = text.toLowerCase();

  const wantsCves = /\bcves?\b|vulnerabilit/.test(lower);
  const wantsNews = /\bnews\b/.test(lower);
  let contentType: ContentType = "both";
  if (wantsCves && !wantsNews) contentType = "cve";
  else if (wantsNews && !wantsCves) contentType = "news";

  const severity: Severity[] = SEVERITIES.filter((s) => new RegExp(`\\b${s.toLowerCase()}\\b`).test(lower));

  let daysBack = DEFAULTS.daysBack;
  const days = /(\d+)\s*days?\b/.exec(lower);
  const weeks = /(\d+)\s*weeks?\b/.exec(lower);
  if (days) daysBack = Number(days[1]);
  else if (weeks) daysBack = Number(weeks[1]) * 7;
  else if (/\btoday\b/.test(lower)) daysBack = 1;
  else if (/\b(?:last|past|this)\s+week\b/.test(lower)) daysBack = 7;
  else if (/\b(?:last|past|this)\s+month\b/.test(lower)) daysBack = 30;

  let maxResults = DEFAULTS.maxResults;
  const results = /(\d+)\s*(?:results?|items?)\b/.exec(lower) ?? /\b(?:top|show|get)\s+(\d+)\b/.exec(lower);
  if (results) maxResults = Number(results[1]);

  return {
    contentType,
    severity,
    daysBack: Math.max(1, daysBack),
    maxResults: Math.min(Math.max(1, maxResults), MAX_RESULTS_CAP),
  };
}
