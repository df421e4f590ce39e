import { z } from 'zod';

const configSchema = z.object({
  // Environment
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  // Server
  port: z.coerce.number().default(3000),
  apiSecretKey: z.string().min(16),
  corsOrigins: z.string().transform((s) => s.split(',')).default('*'),

  // Database
  databaseUrl: z.string().url(),

  // Redis
  redisUrl: z.string().default('redis://localhost:6379'),

  // Telegram
  telegramBotToken: z.string(),
  telegramApiUrl: z.string().url().default('https://api.telegram.org'),
  telegramWebhookSecret: z.string().optional(),

  // AI Services
  openaiApiKey: z.string(),
  sentimentModel: z.string().default('gpt-4o'),
  anthropicApiKey: z.string(),
  dialogueModel: z.string().default('claude-3-5-sonnet-20240620'),
  claudeRpmLimit: z.coerce.number().default(50),
  classifierMaxRetries: z.coerce.number().int().min(0).default(2),

  // Worker / scheduler
  workerConcurrency: z.coerce.number().default(10),
  schedulerTickMs: z.coerce.number().default(60000),
  dispatchTimeoutMs: z.coerce.number().default(15000),

  // Logging
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

function loadConfig() {
  const result = configSchema.safeParse({
    nodeEnv: process.env.NODE_ENV,
    port: process.env.PORT,
    apiSecretKey: process.env.API_SECRET_KEY,
    corsOrigins: process.env.CORS_ORIGINS,
    databaseUrl: process.env.DATABASE_URL,
    redisUrl: process.env.REDIS_URL,
    telegramBotToken: process.env.TELEGRAM_BOT_TOKEN,
    telegramApiUrl: process.env.TELEGRAM_API_URL,
    telegramWebhookSecret: process.env.TELEGRAM_WEBHOOK_SECRET || undefined,
    openaiApiKey: process.env.OPENAI_API_KEY,
    sentimentModel: process.env.SENTIMENT_MODEL,
    anthropicApiKey: process.env.ANTHROPIC_API_KEY,
    dialogueModel: process.env.DIALOGUE_MODEL,
    claudeRpmLimit: process.env.CLAUDE_RPM_LIMIT,
    classifierMaxRetries: process.env.CLASSIFIER_MAX_RETRIES,
    workerConcurrency: process.env.WORKER_CONCURRENCY,
    schedulerTickMs: process.env.SCHEDULER_TICK_MS,
    dispatchTimeoutMs: process.env.DISPATCH_TIMEOUT_MS,
    logLevel: process.env.LOG_LEVEL,
  });

  if (!result.success) {
    console.error('Configuration validation failed:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const config = loadConfig();
export type Config = z.infer<typeof configSchema>;
