import { Router, type Response } from "express";
import { rateLimit } from "express-rate-limit";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { SEVERITIES, toSeverity, type ContentType, type SearchOutcome } from "@shared/types/intel";
import { reqLog } from "backend/utils/req-log";
import { rateLimitConfig } from "backend/utils/rate-limit-config";
import { errorMessage } from "backend/utils/log";
import type { IIntelStorage } from "../queries/intel-storage";
import type { FreshnessAnalyzer } from "../services/freshness-analyzer";
import type { IntelPipeline } from "../services/intel-pipeline";
import { parseQuery } from "../services/query-parser";
import { cleanupExpired } from "../services/retention";
import { toNewsItemDto, toVulnerabilityDto } from "../services/session";
import { getProgressHandler, type ProgressChannel } from "../progress";

const severityList = z
  .array(z.string())
  .default([])
  .superRefine((values, ctx) => {
    const allowed = SEVERITIES.map((s) => s.toLowerCase());
    values.forEach((value, i) => {
      if (!allowed.includes(value.trim().toLowerCase())) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i], message: `Unknown severity "${value}"` });
      }
    });
  })
  .transform((values) => [...new Set(values.map(toSeverity))]);

const contentType = z.enum(["cve", "news", "both"] as const satisfies readonly ContentType[]);

export const searchRequestSchema = z.object({
  content_type: contentType.default("both"),
  severity: severityList,
  days_back: z.coerce.number().int().min(1).max(365).default(7),
  max_results: z.coerce.number().int().min(1).max(50).default(10),
  session_id: z.string().max(50).optional(),
});

const queryRequestSchema = z.object({
  query: z.string().min(1).max(500),
  session_id: z.string().max(50).optional(),
});

const analyzeRequestSchema = z.object({
  content_type: contentType.default("both"),
  severity: z
    .string()
    .optional()
    .transform((value) => (value ? value.split(",").filter(Boolean) : []))
    .pipe(severityList),
  days_back: z.coerce.number().int().min(1).max(365).default(7),
  max_results: z.coerce.number().int().min(1).max(50).default(10),
});

const cleanupRequestSchema = z.object({
  dry_run: z.boolean().default(true),
});

export interface IntelRouterDeps {
  pipeline: IntelPipeline;
  analyzer: FreshnessAnalyzer;
  storage: IIntelStorage;
  progress: ProgressChannel;
  cacheFreshnessHours: number;
  retentionMonths: number;
}

function handleError(res: Response, error: unknown, fallback: string) {
  if (error instanceof z.ZodError) {
    res.status(400).json({ success: false, error: fromZodError(error).message });
    return;
  }
  console.error(`${fallback}:`, error);
  res.status(500).json({ success: false, error: errorMessage(error) || fallback });
}

function sendSearch(res: Response, outcome: SearchOutcome) {
  res.status(outcome.success ? 200 : 500).json(outcome);
}

export function createIntelRouter(deps: IntelRouterDeps): Router {
  const intelRouter = Router();
  const searchLimiter = rateLimit(rateLimitConfig);

  intelRouter.post("/search", searchLimiter, async (req, res) => {
    reqLog(req, "🔎 POST /intel/search");
    try {
      const body = searchRequestSchema.parse(req.body);
      const outcome = await deps.pipeline.search({
        contentType: body.content_type,
        severity: body.severity,
        daysBack: body.days_back,
        maxResults: body.max_results,
        sessionId: body.session_id,
      });
      sendSearch(res, outcome);
    } catch (error) {
      handleError(res, error, "Failed to search intelligence");
    }
  });

  intelRouter.post("/query", searchLimiter, async (req, res) => {
    reqLog(req, "🔎 POST /intel/query");
    try {
      const body = queryRequestSchema.parse(req.body);
      const params = parseQuery(body.query);
      const outcome = await deps.pipeline.search({ ...params, sessionId: body.session_id });
      sendSearch(res, outcome);
    } catch (error) {
      handleError(res, error, "Failed to run query");
    }
  });

  intelRouter.get("/analyze", async (req, res) => {
    reqLog(req, "GET /intel/analyze");
    try {
      const query = analyzeRequestSchema.parse(req.query);
      const analysis = await deps.analyzer.analyze({
        contentType: query.content_type,
        severity: query.severity,
        daysBack: query.days_back,
        maxResults: query.max_results,
      });
      res.json({
        recommendation: analysis.recommendation,
        reasoning: analysis.reasoning,
        existing_cves: analysis.existingCves,
        existing_news: analysis.existingNews,
        needed_cves: analysis.neededCves,
        needed_news: analysis.neededNews,
        cutoff: analysis.cutoff.toISOString(),
      });
    } catch (error) {
      handleError(res, error, "Failed to analyze data needs");
    }
  });

  intelRouter.get("/freshness", async (req, res) => {
    reqLog(req, "GET /intel/freshness");
    try {
      const freshness = await deps.analyzer.checkCacheFreshness(deps.cacheFreshnessHours);
      res.json({
        is_fresh: freshness.isFresh,
        last_scrape: freshness.lastScrape?.toISOString() ?? null,
        age_hours: freshness.ageHours,
        threshold_hours: freshness.thresholdHours,
        sources: freshness.sources,
      });
    } catch (error) {
      handleError(res, error, "Failed to check cache freshness");
    }
  });

  intelRouter.get("/stats", async (req, res) => {
    reqLog(req, "GET /intel/stats");
    try {
      res.json(await deps.storage.getDataStatistics());
    } catch (error) {
      handleError(res, error, "Failed to fetch statistics");
    }
  });

  intelRouter.get("/sessions/recent", async (req, res) => {
    reqLog(req, "GET /intel/sessions/recent");
    try {
      const hours = z.coerce.number().int().min(1).max(24 * 30).default(24).parse(req.query.hours);
      const sessions = await deps.storage.getRecentSessions(hours);
      res.json({
        sessions: sessions.map((s) => ({ ...s, first_seen: s.first_seen?.toISOString() ?? null })),
      });
    } catch (error) {
      handleError(res, error, "Failed to fetch recent sessions");
    }
  });

  intelRouter.get("/sessions/:sessionId", async (req, res) => {
    reqLog(req, `GET /intel/sessions/${req.params.sessionId}`);
    try {
      const limit = z.coerce.number().int().min(1).max(500).default(50).parse(req.query.limit);
      const items = await deps.storage.getItemsBySession(req.params.sessionId, limit);
      res.json({
        ...items,
        cves: items.cves.map(toVulnerabilityDto),
        news: items.news.map(toNewsItemDto),
      });
    } catch (error) {
      handleError(res, error, "Failed to fetch session items");
    }
  });

  intelRouter.get("/progress/:sessionId", getProgressHandler(deps.progress));

  intelRouter.post("/maintenance/cleanup", async (req, res) => {
    reqLog(req, "POST /intel/maintenance/cleanup");
    try {
      const body = cleanupRequestSchema.parse(req.body ?? {});
      res.json(await cleanupExpired(deps.storage, { months: deps.retentionMonths, dryRun: body.dry_run }));
    } catch (error) {
      handleError(res, error, "Failed to clean up expired data");
    }
  });

  return intelRouter;
}
