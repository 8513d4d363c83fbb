import pLimit from "p-limit";
import { log, errorMessage } from "backend/utils/log";
import type { Article, ClassificationResult, ClassifiedRecord } from "@shared/types/intel";
import type { DedupGate } from "./dedup-gate";

const SOURCE = "classification";

export const MIN_CONTENT_LENGTH = 200;

export const SECURITY_KEYWORDS = [
  "cve",
  "vulnerability",
  "exploit",
  "security",
  "attack",
  "breach",
  "malware",
  "ransomware",
  "patch",
  "zero-day",
];

export interface ClassificationItem {
  index: number;
  content: string;
  url: string;
}

export interface ClassificationOutcome {
  index: number;
  url: string;
  success: boolean;
  results: ClassificationResult[];
  error?: string;
}

export interface ClassificationBatch {
  status: "completed" | "empty_batch";
  outcomes: ClassificationOutcome[];
  successful: number;
  failed: number;
  error?: string;
}

export interface TextClassifier {
  classify(text: string): Promise<ClassificationResult[]>;
}

/**
 * Classifies every item on a bounded pool. Each item is isolated: a thrown
 * error or an empty result marks that item failed and nothing else.
 * Outcomes come back in input index order.
 */
export async function classifyMany(
  classifier: TextClassifier,
  items: ClassificationItem[],
  maxWorkers: number,
): Promise<ClassificationBatch> {
  if (items.length === 0) {
    return {
      status: "empty_batch",
      outcomes: [],
      successful: 0,
      failed: 0,
      error: "No articles to classify",
    };
  }

  const limit = pLimit(Math.max(1, maxWorkers));
  const startTime = Date.now();
  log(`Classifying ${items.length} articles with ${maxWorkers} workers`, SOURCE);

  const settled = await Promise.allSettled(
    items.map((item) =>
      limit(async (): Promise<ClassificationOutcome> => {
        try {
          const results = await classifier.classify(item.content);
          if (results.length === 0) {
            return { index: item.index, url: item.url, success: false, results: [], error: "no classification results" };
          }
          return { index: item.index, url: item.url, success: true, results };
        } catch (error) {
          const message = errorMessage(error);
          log(`Classification failed for ${item.url}: ${message}`, SOURCE, "error");
          return { index: item.index, url: item.url, success: false, results: [], error: message };
        }
      }),
    ),
  );

  const outcomes = settled
    .map((result, i): ClassificationOutcome =>
      result.status === "fulfilled"
        ? result.value
        : { index: items[i].index, url: items[i].url, success: false, results: [], error: errorMessage(result.reason) },
    )
    .sort((a, b) => a.index - b.index);

  const successful = outcomes.filter((o) => o.success).length;
  const failed = outcomes.length - successful;
  log(
    `Classification batch done in ${Date.now() - startTime}ms: ${successful} successful, ${failed} failed`,
    SOURCE,
  );

  return { status: "completed", outcomes, successful, failed };
}

export interface SkippedArticle {
  url: string;
  reason: "already_classified" | "too_short" | "not_security_related";
}

export interface PreparedBatch {
  items: ClassificationItem[];
  alreadyClassified: ClassifiedRecord[];
  skipped: SkippedArticle[];
}

export function classificationText(article: Article): string {
  const title = article.titleTranslated || article.title;
  const content = article.contentTranslated || article.content;
  return `${title}\n\n${content}`;
}

export function looksSecurityRelated(text: string): boolean {
  const lower = text.toLowerCase();
  return SECURITY_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * Splits articles into work for the classifier and records already in
 * storage. Items keep the index of their article.
 */
export async function prepareClassificationBatch(
  articles: Article[],
  gate: DedupGate,
): Promise<PreparedBatch> {
  const batch: PreparedBatch = { items: [], alreadyClassified: [], skipped: [] };

  for (const [index, article] of articles.entries()) {
    const url = article.url.trim();

    const existing = await gate.getClassified(url);
    if (existing) {
      batch.alreadyClassified.push(existing);
      batch.skipped.push({ url, reason: "already_classified" });
      continue;
    }

    const content = article.contentTranslated || article.content;
    if (content.trim().length < MIN_CONTENT_LENGTH) {
      batch.skipped.push({ url, reason: "too_short" });
      continue;
    }

    const text = classificationText(article);
    if (!looksSecurityRelated(`${text}\n${article.title}\n${article.content}`)) {
      batch.skipped.push({ url, reason: "not_security_related" });
      continue;
    }

    batch.items.push({ index, content: text, url });
  }

  log(
    `Prepared ${batch.items.length} articles for classification, ` +
      `${batch.alreadyClassified.length} already classified, ${batch.skipped.length} skipped`,
    SOURCE,
  );
  return batch;
}
