import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import type { Config } from './config';
import { logger as rootLogger, Logger } from './infra/logging/logger';
import { Database } from './infra/db/client';
import { PgScoreRepository } from './infra/db/score-repository';
import { PgPatientRepository } from './infra/db/patient-repository';
import { PgAlertRepository } from './infra/db/alert-repository';
import { createRedisConnection, QueueClient } from './infra/queue/client';
import { TelegramClient } from './adapters/telegram/client';
import { ScoreStore } from './domain/scoring/store';
import { OpenAISentimentClassifier } from './domain/ai/sentiment';
import { AnthropicFollowUpGenerator } from './domain/ai/dialogue';
import { ConversationEngine } from './domain/conversation/engine';
import { AlertEngine } from './domain/alerts/engine';
import { PatientService } from './domain/patients/service';
import { DashboardService } from './domain/dashboard/service';
import { Scheduler } from './domain/scheduler/scheduler';
import { QueueCheckinDispatcher } from './domain/scheduler/dispatchers';
import { systemClock } from './shared/types';

export interface Services {
  db: Database;
  queue: QueueClient;
  telegram: TelegramClient;
  store: ScoreStore;
  engine: ConversationEngine;
  alerts: AlertEngine;
  patients: PatientService;
  dashboard: DashboardService;
  scheduler: Scheduler;
  close(): Promise<void>;
}

/**
 * Wire every service against the real Postgres, Redis, Telegram and AI clients.
 * The API and the worker each build one container at start-up.
 */
export function createServices(config: Config, log: Logger = rootLogger): Services {
  const db = new Database(config.databaseUrl, log);
  const queue = new QueueClient(createRedisConnection(config.redisUrl, log), log);

  const scoreRepo = new PgScoreRepository(db);
  const patientRepo = new PgPatientRepository(db);
  const alertRepo = new PgAlertRepository(db);

  const telegram = new TelegramClient({
    botToken: config.telegramBotToken,
    apiUrl: config.telegramApiUrl,
    log,
  });

  const store = new ScoreStore(scoreRepo, systemClock, log);

  const classifier = new OpenAISentimentClassifier(
    new OpenAI({ apiKey: config.openaiApiKey }),
    config.sentimentModel
  );
  const generator = new AnthropicFollowUpGenerator(
    new Anthropic({ apiKey: config.anthropicApiKey }),
    config.dialogueModel,
    config.claudeRpmLimit
  );

  const engine = new ConversationEngine(
    store,
    telegram,
    classifier,
    generator,
    { classifierRetries: config.classifierMaxRetries },
    log
  );

  const alerts = new AlertEngine(alertRepo, patientRepo, scoreRepo, telegram, systemClock, log);
  const patients = new PatientService(patientRepo, systemClock, undefined, log);
  const dashboard = new DashboardService(patientRepo, scoreRepo, systemClock);

  const scheduler = new Scheduler(
    patientRepo,
    new QueueCheckinDispatcher(queue),
    { dispatchTimeoutMs: config.dispatchTimeoutMs },
    log
  );

  return {
    db,
    queue,
    telegram,
    store,
    engine,
    alerts,
    patients,
    dashboard,
    scheduler,
    async close() {
      await queue.close();
      await db.close();
    },
  };
}
