import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createServer } from 'http';
import dotenvConfig from './utils/dotenv-config';
import { loadConfig } from './utils/config';
import { log, errorMessage } from './utils/log';
import logTime from './middleware/log-time';
import { callId } from './middleware/call-id';
import { corsOptions } from './utils/cors-options';
import { openDatabase } from './db/db';
import { createApiRouter } from './router';
import { initializeSocketIO } from './services/socket-server';
import { createIntelStorage } from './apps/threat-intel/queries/intel-storage';
import { ProgressChannel } from './apps/threat-intel/progress';
import { DedupGate } from './apps/threat-intel/services/dedup-gate';
import { FreshnessAnalyzer } from './apps/threat-intel/services/freshness-analyzer';
import { Classifier } from './apps/threat-intel/services/classifier';
import { OpenAiLlmClient, createOpenAI } from './apps/threat-intel/services/llm';
import { OpenAiTranslator } from './apps/threat-intel/services/translator';
import { IntelPipeline } from './apps/threat-intel/services/intel-pipeline';
import { IntelScheduler } from './apps/threat-intel/services/scheduler';
import { loadFeedSources } from './apps/threat-intel/scrapers';
import { FeedScraper } from './apps/threat-intel/scrapers/feed-scraper';

async function main() {
  dotenvConfig();
  const config = loadConfig();
  const isProduction = config.env === 'production';

  console.log("[🌐 NODE_ENV]", config.env)

  const database = openDatabase(config.storage);
  await database.applySchema();

  const storage = createIntelStorage(database);
  const gate = new DedupGate(storage);
  const analyzer = new FreshnessAnalyzer(storage);
  const progress = new ProgressChannel();

  const openai = createOpenAI(config.openai.apiKey);
  if (!openai) {
    log('OPENAI_API_KEY is not set; searches that need a scrape will fail', 'server', 'warn');
  }
  const classifier = new Classifier(new OpenAiLlmClient(openai, {
    model: config.openai.classifierModel,
    timeoutMs: config.openai.timeoutMs,
    maxTokens: config.openai.classifierMaxTokens,
    temperature: 0,
  }));
  const translator = new OpenAiTranslator(new OpenAiLlmClient(openai, {
    model: config.openai.translationModel,
    timeoutMs: config.openai.timeoutMs,
    maxTokens: 800,
    temperature: 0.1,
  }));

  const scrapers = loadFeedSources().map((source) => new FeedScraper(source, gate));

  const pipeline = new IntelPipeline({
    storage,
    gate,
    analyzer,
    classifier,
    translator,
    scrapers,
    progress,
    settings: {
      classificationWorkers: config.workers.classification,
      translationWorkers: config.workers.translation,
      scraperTimeoutMs: config.scraperTimeoutMs,
    },
  });

  const app = express();
  const httpServer = createServer(app);

  app.set('trust proxy', 1);
  app.use(helmet());
  app.use(callId);
  app.use(logTime);
  app.use(cors(corsOptions(config.frontendUrl)));
  app.use(express.json());
  app.use('/api', createApiRouter({
    pipeline,
    analyzer,
    storage,
    progress,
    dialect: database.dialect,
    cacheFreshnessHours: config.cacheFreshnessHours,
    retentionMonths: config.retentionMonths,
  }));

  initializeSocketIO(httpServer, { frontendUrl: config.frontendUrl, isProduction, progress });

  const scheduler = config.scheduleType === 'off'
    ? null
    : new IntelScheduler(pipeline, analyzer, storage, {
      scheduleType: config.scheduleType,
      cacheFreshnessHours: config.cacheFreshnessHours,
      retentionMonths: config.retentionMonths,
    });

  httpServer.listen(config.port, () => {
    console.log(`🌐 [SERVER] Server is running on port ${config.port} (${database.dialect})`);

    try {
      scheduler?.start();
    } catch (error) {
      console.error('❌ [SERVER] Error initializing scheduler:', error);
    }
  });

  const shutdown = (signal: string) => {
    log(`${signal} received, shutting down`, 'server');
    scheduler?.stop();
    httpServer.close(() => {
      database.close()
        .catch((error) => log(`Error closing database: ${errorMessage(error)}`, 'server', 'error'))
        .finally(() => process.exit(0));
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error) => {
  console.error('❌ [SERVER] Failed to start:', error);
  process.exit(1);
});
