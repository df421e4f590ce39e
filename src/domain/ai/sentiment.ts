import OpenAI from 'openai';
import { logger as rootLogger, Logger } from '../../infra/logging/logger';
import { ClassifierError, isAppError, toError, withRetry } from '../../shared/errors';
import { PLACEHOLDER_SESSION_SCORE } from '../../shared/types';

/** Neutral score used whenever the classifier cannot produce one. */
export const NEUTRAL_SCORE = PLACEHOLDER_SESSION_SCORE;

export interface SentimentClassifier {
  /** Score in [0, 1]; implementations may return out-of-range values or throw. */
  classify(text: string): Promise<number>;
}

const SYSTEM_PROMPT = 'You are a sentiment analysis system that returns scores between 0 and 1.';

function buildUserPrompt(text: string): string {
  return (
    'Analyze the sentiment of the following text and return a score between 0 and 1, ' +
    `where 0 is extremely negative and 1 is extremely positive: '${text}'. ` +
    'Return only the numerical score without any explanation.'
  );
}

/**
 * Pull the first number out of a model completion ("0.72", "Score: 0.7").
 */
export function parseScore(text: string): number | null {
  const match = /-?\d+(?:\.\d+)?/.exec(text);
  if (!match) return null;
  const value = Number(match[0]);
  return Number.isFinite(value) ? value : null;
}

export class OpenAISentimentClassifier implements SentimentClassifier {
  constructor(
    private client: OpenAI,
    private model: string
  ) {}

  async classify(text: string): Promise<number> {
    let content: string;

    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildUserPrompt(text) },
        ],
        max_tokens: 10,
        temperature: 0,
      });
      content = completion.choices[0]?.message.content?.trim() ?? '';
    } catch (error) {
      const err = toError(error);
      throw new ClassifierError(err.message, err);
    }

    const score = parseScore(content);
    if (score === null) {
      throw new ClassifierError(`Unparseable score: ${content.substring(0, 40)}`);
    }
    return score;
  }
}

// ============================================================================
// Fallback Wrapper
// ============================================================================

export interface ClassifyOptions {
  maxRetries: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  log?: Logger;
}

export interface ClassifyResult {
  score: number;
  /** True when the neutral score was substituted */
  fallback: boolean;
}

/**
 * Classify with bounded retries. Never rejects: when every attempt fails the
 * neutral score is returned and the conversation carries on.
 */
export async function classifyWithFallback(
  classifier: SentimentClassifier,
  text: string,
  options: ClassifyOptions
): Promise<ClassifyResult> {
  const log = options.log ?? rootLogger;

  try {
    const score = await withRetry(() => classifier.classify(text), {
      maxRetries: options.maxRetries,
      initialDelayMs: options.initialDelayMs ?? 500,
      maxDelayMs: options.maxDelayMs ?? 4000,
      shouldRetry: () => true,
    });
    return { score, fallback: false };
  } catch (error) {
    log.warn(
      {
        error: toError(error).message,
        code: isAppError(error) ? error.code : undefined,
        attempts: options.maxRetries + 1,
      },
      'Sentiment classification failed, using neutral score'
    );
    return { score: NEUTRAL_SCORE, fallback: true };
  }
}
