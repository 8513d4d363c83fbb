import { sql, type SQL } from "drizzle-orm";
import type { Row, SqlExecutor } from "backend/db/db";
import {
  toSeverity,
  type Article,
  type NewsItem,
  type Severity,
  type Vulnerability,
} from "@shared/types/intel";
import { normalizeDateForArticle, parseDateSafe } from "../services/date-normalizer";

export interface CveQuery {
  severity: Severity[];
  since: Date;
  limit: number;
}

export interface NewsQuery {
  since: Date;
  limit: number;
}

export interface SessionItems {
  session_id: string;
  cves: Vulnerability[];
  news: NewsItem[];
  total_cves: number;
  total_news: number;
}

export interface SessionSummary {
  session_id: string;
  cve_count: number;
  news_count: number;
  first_seen: Date | null;
}

export interface DataStatistics {
  cves: { count: number; avg_cvss: number; avg_intrigue: number };
  news: { count: number; avg_intrigue: number };
  raw_articles: { count: number; unprocessed: number; last_24h: number };
}

export type RetentionTable = "cves" | "newsitems" | "raw_articles";

// Which column decides an expired row
const RETENTION_COLUMN: Record<RetentionTable, string> = {
  cves: "published_date",
  newsitems: "published_date",
  raw_articles: "scraped_at",
};

export interface IIntelStorage {
  // Raw articles
  insertRawArticle(article: Article, sessionId: string): Promise<boolean>;
  findRawArticle(url: string): Promise<Article | null>;
  getUnprocessedArticles(limit: number): Promise<Article[]>;
  markAsProcessed(url: string): Promise<void>;

  // Classified records
  insertCve(cve: Vulnerability, sessionId: string): Promise<boolean>;
  insertNewsItem(news: NewsItem, sessionId: string): Promise<boolean>;
  findCve(url: string): Promise<Vulnerability | null>;
  findNewsItem(url: string): Promise<NewsItem | null>;

  // Range queries
  countCves(query: CveQuery): Promise<number>;
  countNews(query: NewsQuery): Promise<number>;
  getCves(query: CveQuery): Promise<Vulnerability[]>;
  getNews(query: NewsQuery): Promise<NewsItem[]>;

  // Sessions and statistics
  getItemsBySession(sessionId: string, limit: number): Promise<SessionItems>;
  getRecentSessions(hoursBack: number): Promise<SessionSummary[]>;
  getDataStatistics(): Promise<DataStatistics>;
  getLastScrapeTimes(): Promise<Record<string, Date>>;

  // Retention
  countExpired(table: RetentionTable, cutoff: Date): Promise<number>;
  deleteExpired(table: RetentionTable, cutoff: Date): Promise<number>;

  ping(): Promise<void>;
}

// Row coercion. Postgres returns counts as strings and timestamps as Dates,
// SQLite returns plain numbers and ISO text.
function asString(value: unknown, fallback = ""): string {
  if (typeof value === "string") return value;
  if (value === null || value === undefined) return fallback;
  return String(value);
}

function asOptionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function asNumber(value: unknown, fallback = 0): number {
  const n = typeof value === "number" ? value : Number(value);
  return Number.isFinite(n) && value !== null && value !== undefined ? n : fallback;
}

function parseProducts(value: unknown): string[] {
  const text = asString(value).trim();
  if (!text) return [];
  try {
    const parsed: unknown = JSON.parse(text);
    if (Array.isArray(parsed)) {
      return parsed.filter((p): p is string => typeof p === "string");
    }
  } catch {
    // older rows hold a comma separated list
  }
  return text.split(",").map((p) => p.trim()).filter(Boolean);
}

function toArticle(row: Row): Article {
  return {
    id: asNumber(row.id),
    source: asString(row.source),
    url: asString(row.url),
    title: asString(row.title),
    titleTranslated: asOptionalString(row.title_translated),
    content: asString(row.content),
    contentTranslated: asOptionalString(row.content_translated),
    language: asString(row.language, "en"),
    scrapedAt: normalizeDateForArticle(row.scraped_at),
    publishedDate: normalizeDateForArticle(row.published_date ?? row.scraped_at),
    processed: asNumber(row.processed) === 1,
  };
}

function toVulnerability(row: Row): Vulnerability {
  return {
    id: asNumber(row.id),
    cveId: asString(row.cve_id),
    title: asString(row.title),
    titleTranslated: asOptionalString(row.title_translated),
    summary: asString(row.summary),
    severity: toSeverity(row.severity),
    cvssScore: asNumber(row.cvss_score),
    intrigue: asNumber(row.intrigue),
    publishedDate: normalizeDateForArticle(row.published_date),
    originalLanguage: asString(row.original_language, "en"),
    source: asString(row.source),
    url: asString(row.url),
    affectedProducts: parseProducts(row.affected_products),
    sessionId: asOptionalString(row.session_id),
    createdAt: parseDateSafe(row.created_at) ?? undefined,
  };
}

function toNewsItem(row: Row): NewsItem {
  return {
    id: asNumber(row.id),
    title: asString(row.title),
    titleTranslated: asOptionalString(row.title_translated),
    summary: asString(row.summary),
    intrigue: asNumber(row.intrigue),
    publishedDate: normalizeDateForArticle(row.published_date),
    originalLanguage: asString(row.original_language, "en"),
    source: asString(row.source),
    url: asString(row.url),
    sessionId: asOptionalString(row.session_id),
    createdAt: parseDateSafe(row.created_at) ?? undefined,
  };
}

function iso(date: Date): string {
  return date.toISOString();
}

// Empty allow-list means every severity
function severityFilter(severity: Severity[]): SQL {
  if (severity.length === 0) return sql`1 = 1`;
  return sql`upper(severity) IN (${sql.join(severity.map((s) => sql`${s.toUpperCase()}`), sql`, `)})`;
}

function cveWhere(query: CveQuery): SQL {
  return sql`${severityFilter(query.severity)} AND published_date >= ${iso(query.since)}`;
}

export function createIntelStorage(db: SqlExecutor): IIntelStorage {
  async function count(query: SQL): Promise<number> {
    const rows = await db.all(query);
    return rows.length > 0 ? asNumber(rows[0].count) : 0;
  }

  return {
    // RAW ARTICLES
    insertRawArticle: async (article, sessionId) => {
      const changes = await db.run(sql`
        INSERT INTO raw_articles
          (source, url, title, title_translated, content, content_translated,
           language, scraped_at, published_date, processed, session_id)
        VALUES
          (${article.source}, ${article.url.trim()}, ${article.title}, ${article.titleTranslated ?? null},
           ${article.content}, ${article.contentTranslated ?? null}, ${article.language},
           ${iso(article.scrapedAt)}, ${iso(article.publishedDate)}, ${0}, ${sessionId})
        ON CONFLICT (url) DO NOTHING
      `);
      return changes > 0;
    },

    findRawArticle: async (url) => {
      const rows = await db.all(sql`SELECT * FROM raw_articles WHERE url = ${url.trim()} LIMIT 1`);
      return rows.length > 0 ? toArticle(rows[0]) : null;
    },

    getUnprocessedArticles: async (limit) => {
      const rows = await db.all(sql`
        SELECT * FROM raw_articles WHERE processed = ${0}
        ORDER BY scraped_at DESC, id ASC LIMIT ${limit}
      `);
      return rows.map(toArticle);
    },

    markAsProcessed: async (url) => {
      await db.run(sql`UPDATE raw_articles SET processed = ${1} WHERE url = ${url.trim()}`);
    },

    // CLASSIFIED RECORDS
    insertCve: async (cve, sessionId) => {
      const changes = await db.run(sql`
        INSERT INTO cves
          (cve_id, title, title_translated, summary, severity, cvss_score, published_date,
           original_language, source, url, intrigue, affected_products, session_id)
        VALUES
          (${cve.cveId}, ${cve.title}, ${cve.titleTranslated ?? null}, ${cve.summary}, ${cve.severity},
           ${cve.cvssScore}, ${iso(cve.publishedDate)}, ${cve.originalLanguage}, ${cve.source},
           ${cve.url.trim()}, ${cve.intrigue}, ${JSON.stringify(cve.affectedProducts)}, ${sessionId})
        ON CONFLICT (url) DO NOTHING
      `);
      return changes > 0;
    },

    insertNewsItem: async (news, sessionId) => {
      const changes = await db.run(sql`
        INSERT INTO newsitems
          (title, title_translated, summary, published_date, original_language, source, url,
           intrigue, session_id)
        VALUES
          (${news.title}, ${news.titleTranslated ?? null}, ${news.summary}, ${iso(news.publishedDate)},
           ${news.originalLanguage}, ${news.source}, ${news.url.trim()}, ${news.intrigue}, ${sessionId})
        ON CONFLICT (url) DO NOTHING
      `);
      return changes > 0;
    },

    findCve: async (url) => {
      const rows = await db.all(sql`SELECT * FROM cves WHERE url = ${url.trim()} LIMIT 1`);
      return rows.length > 0 ? toVulnerability(rows[0]) : null;
    },

    findNewsItem: async (url) => {
      const rows = await db.all(sql`SELECT * FROM newsitems WHERE url = ${url.trim()} LIMIT 1`);
      return rows.length > 0 ? toNewsItem(rows[0]) : null;
    },

    // RANGE QUERIES
    countCves: (query) =>
      count(sql`
        SELECT COUNT(*) AS count FROM (
          SELECT 1 FROM cves WHERE ${cveWhere(query)} LIMIT ${query.limit}
        ) capped
      `),

    countNews: (query) =>
      count(sql`
        SELECT COUNT(*) AS count FROM (
          SELECT 1 FROM newsitems WHERE published_date >= ${iso(query.since)} LIMIT ${query.limit}
        ) capped
      `),

    getCves: async (query) => {
      const rows = await db.all(sql`
        SELECT * FROM cves WHERE ${cveWhere(query)}
        ORDER BY (cvss_score * 0.6 + intrigue * 0.4) DESC, id ASC
        LIMIT ${query.limit}
      `);
      return rows.map(toVulnerability);
    },

    getNews: async (query) => {
      const rows = await db.all(sql`
        SELECT * FROM newsitems WHERE published_date >= ${iso(query.since)}
        ORDER BY intrigue DESC, id ASC
        LIMIT ${query.limit}
      `);
      return rows.map(toNewsItem);
    },

    // SESSIONS
    getItemsBySession: async (sessionId, limit) => {
      const cveRows = await db.all(sql`
        SELECT * FROM cves WHERE session_id = ${sessionId} ORDER BY created_at DESC, id DESC LIMIT ${limit}
      `);
      const newsRows = await db.all(sql`
        SELECT * FROM newsitems WHERE session_id = ${sessionId} ORDER BY created_at DESC, id DESC LIMIT ${limit}
      `);
      const cves = cveRows.map(toVulnerability);
      const news = newsRows.map(toNewsItem);
      return { session_id: sessionId, cves, news, total_cves: cves.length, total_news: news.length };
    },

    getRecentSessions: async (hoursBack) => {
      const since = iso(new Date(Date.now() - hoursBack * 60 * 60 * 1000));
      const grouped = (table: SQL) => db.all(sql`
        SELECT session_id, COUNT(*) AS count, MIN(created_at) AS first_seen
        FROM ${table} WHERE created_at >= ${since} GROUP BY session_id
      `);
      const cveRows = await grouped(sql.raw("cves"));
      const newsRows = await grouped(sql.raw("newsitems"));

      const sessions = new Map<string, SessionSummary>();
      const entry = (row: Row) => {
        const id = asString(row.session_id, "unknown");
        let summary = sessions.get(id);
        if (!summary) {
          summary = { session_id: id, cve_count: 0, news_count: 0, first_seen: null };
          sessions.set(id, summary);
        }
        const seen = parseDateSafe(row.first_seen);
        if (seen && (!summary.first_seen || seen < summary.first_seen)) {
          summary.first_seen = seen;
        }
        return summary;
      };
      cveRows.forEach((row) => { entry(row).cve_count += asNumber(row.count); });
      newsRows.forEach((row) => { entry(row).news_count += asNumber(row.count); });

      return [...sessions.values()].sort(
        (a, b) => (b.first_seen?.getTime() ?? 0) - (a.first_seen?.getTime() ?? 0),
      );
    },

    getDataStatistics: async () => {
      const [cveStats] = await db.all(sql`
        SELECT COUNT(*) AS count, AVG(cvss_score) AS avg_cvss, AVG(intrigue) AS avg_intrigue FROM cves
      `);
      const [newsStats] = await db.all(sql`
        SELECT COUNT(*) AS count, AVG(intrigue) AS avg_intrigue FROM newsitems
      `);
      const dayAgo = iso(new Date(Date.now() - 24 * 60 * 60 * 1000));
      const [rawStats] = await db.all(sql`
        SELECT COUNT(*) AS count,
               SUM(CASE WHEN processed = 0 THEN 1 ELSE 0 END) AS unprocessed,
               SUM(CASE WHEN scraped_at >= ${dayAgo} THEN 1 ELSE 0 END) AS last_24h
        FROM raw_articles
      `);
      return {
        cves: {
          count: asNumber(cveStats?.count),
          avg_cvss: asNumber(cveStats?.avg_cvss),
          avg_intrigue: asNumber(cveStats?.avg_intrigue),
        },
        news: {
          count: asNumber(newsStats?.count),
          avg_intrigue: asNumber(newsStats?.avg_intrigue),
        },
        raw_articles: {
          count: asNumber(rawStats?.count),
          unprocessed: asNumber(rawStats?.unprocessed),
          last_24h: asNumber(rawStats?.last_24h),
        },
      };
    },

    getLastScrapeTimes: async () => {
      const rows = await db.all(sql`
        SELECT lower(source) AS source, MAX(scraped_at) AS last_scraped
        FROM raw_articles GROUP BY lower(source)
      `);
      const times: Record<string, Date> = {};
      for (const row of rows) {
        const last = parseDateSafe(row.last_scraped);
        if (last) times[asString(row.source)] = last;
      }
      return times;
    },

    // RETENTION
    countExpired: (table, cutoff) =>
      count(sql`
        SELECT COUNT(*) AS count FROM ${sql.raw(table)}
        WHERE ${sql.raw(RETENTION_COLUMN[table])} < ${iso(cutoff)}
      `),

    deleteExpired: (table, cutoff) =>
      db.run(sql`
        DELETE FROM ${sql.raw(table)} WHERE ${sql.raw(RETENTION_COLUMN[table])} < ${iso(cutoff)}
      `),

    ping: async () => {
      await db.all(sql`SELECT 1 AS ok`);
    },
  };
}
