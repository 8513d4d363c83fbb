// Background refresh and retention, driven by node-cron
import * as cron from 'node-cron';
import { log, errorMessage } from "backend/utils/log";
import type { SearchParams } from "@shared/types/intel";
import type { IIntelStorage } from "../queries/intel-storage";
import type { FreshnessAnalyzer } from "./freshness-analyzer";
import type { IntelPipeline } from "./intel-pipeline";
import { cleanupExpired } from "./retention";

const SOURCE = 'intel-scheduler';

export type ScheduleType = 'production' | 'testing';

export const SCHEDULE_PRESETS: Record<ScheduleType, { cron: string; label: string; params: Omit<SearchParams, 'sessionId'> }> = {
  production: {
    cron: '0 */6 * * *',
    label: 'every 6 hours',
    params: { contentType: 'both', severity: [], daysBack: 3, maxResults: 30 },
  },
  testing: {
    cron: '*/30 * * * *',
    label: 'every 30 minutes',
    params: { contentType: 'both', severity: ['Critical', 'High'], daysBack: 1, maxResults: 15 },
  },
};

// Daily at 03:00 UTC
const RETENTION_CRON = '0 3 * * *';

export interface SchedulerOptions {
  scheduleType: ScheduleType;
  cacheFreshnessHours: number;
  retentionMonths: number;
}

export type RefreshOutcome =
  | { status: 'skipped'; reason: string }
  | { status: 'completed'; sessionId: string; totalResults: number }
  | { status: 'failed'; error: string };

export class IntelScheduler {
  private refreshJob: cron.ScheduledTask | null = null;
  private retentionJob: cron.ScheduledTask | null = null;
  private isRunning = false;

  constructor(
    private readonly pipeline: IntelPipeline,
    private readonly analyzer: FreshnessAnalyzer,
    private readonly storage: IIntelStorage,
    private readonly options: SchedulerOptions,
  ) {}

  start() {
    if (this.refreshJob) {
      log('Scheduler already initialized', SOURCE);
      return;
    }

    const preset = SCHEDULE_PRESETS[this.options.scheduleType];

    this.refreshJob = cron.schedule(preset.cron, () => {
      this.runRefresh().catch((error) => {
        log(`Scheduled refresh crashed: ${errorMessage(error)}`, SOURCE, 'error');
      });
    }, {
      scheduled: false,
      timezone: "UTC"
    });

    this.retentionJob = cron.schedule(RETENTION_CRON, () => {
      cleanupExpired(this.storage, { months: this.options.retentionMonths }).catch((error) => {
        log(`Scheduled cleanup crashed: ${errorMessage(error)}`, SOURCE, 'error');
      });
    }, {
      scheduled: false,
      timezone: "UTC"
    });

    this.refreshJob.start();
    this.retentionJob.start();
    log(`Scheduler initialized (${this.options.scheduleType}) - refresh ${preset.label}`, SOURCE);
  }

  stop() {
    this.refreshJob?.stop();
    this.retentionJob?.stop();
    this.refreshJob = null;
    this.retentionJob = null;
    log('Scheduler stopped', SOURCE);
  }

  /** One refresh tick: skipped while another runs or while the cache is fresh. */
  async runRefresh(now: Date = new Date()): Promise<RefreshOutcome> {
    if (this.isRunning) {
      log('Previous refresh still running, skipping...', SOURCE);
      return { status: 'skipped', reason: 'already running' };
    }

    this.isRunning = true;
    try {
      const freshness = await this.analyzer.checkCacheFreshness(this.options.cacheFreshnessHours);
      if (freshness.isFresh) {
        return { status: 'skipped', reason: 'cache is fresh' };
      }

      const preset = SCHEDULE_PRESETS[this.options.scheduleType];
      const outcome = await this.pipeline.search({ ...preset.params, sessionId: `cron_${now.getTime()}` });
      if (!outcome.success) {
        return { status: 'failed', error: outcome.error };
      }
      log(`Refresh ${outcome.session_id} stored ${outcome.stats.newly_classified} new records`, SOURCE);
      return { status: 'completed', sessionId: outcome.session_id, totalResults: outcome.total_results };
    } catch (error) {
      const message = errorMessage(error);
      log(`Refresh failed: ${message}`, SOURCE, 'error');
      return { status: 'failed', error: message };
    } finally {
      this.isRunning = false;
    }
  }
}
