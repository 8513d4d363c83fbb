import type { ClassifiedRecord } from "@shared/types/intel";
import type { IIntelStorage } from "../queries/intel-storage";

/**
 * Url-keyed idempotence checks used before scraping, translating,
 * classifying and inserting. Inserts are insert-if-absent on top of this.
 */
export class DedupGate {
  constructor(private readonly storage: IIntelStorage) {}

  async isScraped(url: string): Promise<boolean> {
    return (await this.storage.findRawArticle(url.trim())) !== null;
  }

  async isClassified(url: string): Promise<boolean> {
    return (await this.getClassified(url)) !== null;
  }

  async getClassified(url: string): Promise<ClassifiedRecord | null> {
    const key = url.trim();
    const cve = await this.storage.findCve(key);
    if (cve) return { kind: "cve", record: cve };
    const news = await this.storage.findNewsItem(key);
    if (news) return { kind: "news", record: news };
    return null;
  }
}
