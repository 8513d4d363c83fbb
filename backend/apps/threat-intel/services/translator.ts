import pLimit from "p-limit";
import { log, errorMessage } from "backend/utils/log";
import type { Article } from "@shared/types/intel";
import type { LlmClient } from "./llm";

const SOURCE = "translator";

const LANGUAGE_NAMES: Record<string, string> = {
  zh: "Chinese",
  ru: "Russian",
  en: "English",
};

export interface Translator {
  /** Never throws; returns the input when translation is not possible. */
  translate(text: string, sourceLang: string, kind?: "title" | "content"): Promise<string>;
}

export class OpenAiTranslator implements Translator {
  constructor(private readonly llm: LlmClient) {}

  async translate(text: string, sourceLang: string, kind: "title" | "content" = "content"): Promise<string> {
    if (sourceLang === "en" || !text.trim()) {
      return text;
    }

    const languageName = LANGUAGE_NAMES[sourceLang] ?? sourceLang;
    try {
      const result = await this.llm.complete(text, {
        system: `Translate the following text from ${languageName} to English. Keep it concise and accurate.`,
        temperature: 0.1,
        maxTokens: kind === "title" ? 200 : 800,
        timeoutMs: 15_000,
      });
      return result.trim() || text;
    } catch (error) {
      log(`Translation error (${sourceLang}): ${errorMessage(error)}`, SOURCE, "error");
      return text;
    }
  }
}

// Character budget before translation; CJK and Cyrillic carry more per char
const BASE_TRUNCATE_LENGTH = 1000;
const LANGUAGE_FACTORS: Record<string, number> = { zh: 0.4, ru: 0.7 };

export function truncateText(text: string, language: string, baseLength = BASE_TRUNCATE_LENGTH): string {
  const maxLength = Math.floor(baseLength * (LANGUAGE_FACTORS[language] ?? 1));
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}

/**
 * Translates titles and contents as independent units on a bounded pool and
 * writes results back onto the articles. English articles are copied through,
 * articles with both fields already translated are left alone.
 */
export async function translateArticlesParallel(
  articles: Article[],
  translator: Translator,
  maxWorkers: number,
): Promise<Article[]> {
  type Unit = { article: Article; field: "titleTranslated" | "contentTranslated"; text: string };
  const units: Unit[] = [];

  for (const article of articles) {
    if (article.language === "en") {
      article.titleTranslated = article.titleTranslated ?? article.title;
      article.contentTranslated = article.contentTranslated ?? article.content;
      continue;
    }
    if (!article.titleTranslated) {
      units.push({ article, field: "titleTranslated", text: article.title });
    }
    if (!article.contentTranslated) {
      units.push({ article, field: "contentTranslated", text: article.content });
    }
  }

  if (units.length === 0) {
    return articles;
  }

  const limit = pLimit(Math.max(1, maxWorkers));
  const startTime = Date.now();

  const settled = await Promise.allSettled(
    units.map((unit) =>
      limit(async () => {
        const kind = unit.field === "titleTranslated" ? "title" : "content";
        unit.article[unit.field] = await translator.translate(unit.text, unit.article.language, kind);
      }),
    ),
  );

  const failed = settled.filter((r) => r.status === "rejected");
  if (failed.length > 0) {
    log(`${failed.length} translation units failed, originals kept`, SOURCE, "warn");
  }
  log(`Translated ${units.length} fields in ${Date.now() - startTime}ms`, SOURCE);
  return articles;
}
