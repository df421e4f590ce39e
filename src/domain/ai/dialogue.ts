import Anthropic from '@anthropic-ai/sdk';
import { AIServiceError, toError } from '../../shared/errors';
import { RateLimiter } from '../../shared/rate-limiter';
import type { MessageRecord } from '../../shared/types';

export const FALLBACK_FOLLOW_UP =
  "How are you feeling today? Is there anything specific you'd like to talk about?";

export interface FollowUpContext {
  patientName: string;
  condition: string | null;
  /** Recent scored exchanges, oldest first */
  history: Pick<MessageRecord, 'question' | 'response' | 'score'>[];
}

export interface FollowUpGenerator {
  generateFollowUp(context: FollowUpContext): Promise<string>;
}

// ============================================================================
// Prompt Construction
// ============================================================================

export function buildSystemPrompt(context: FollowUpContext): string {
  const name = context.patientName || 'the patient';
  const condition = context.condition || 'mental health concerns';

  return [
    `You are a supportive mental health assistant helping ${name}, who has ${condition}.`,
    'Be empathetic, thoughtful, and ask follow-up questions to better understand their concerns.',
    'Your task is to generate a new question for the patient based on their conversation history.',
    'Keep responses concise (2-3 sentences) and conversational.',
    "Don't diagnose or provide medical advice, but focus on supportive listening and asking good questions.",
    'If they express thoughts of self-harm or harm to others, suggest they contact emergency services or a crisis helpline.',
  ].join('\n');
}

/**
 * Flatten the recent exchanges into one transcript, each line tagged with its
 * speaker and the reply's sentiment score.
 */
export function buildTranscript(history: FollowUpContext['history']): string {
  const lines = history.flatMap((m) => [
    `[assistant] ${m.question}`,
    `[patient, sentiment ${(m.score ?? 0.5).toFixed(2)}] ${m.response}`,
  ]);

  const transcript = lines.length > 0 ? lines.join('\n') : '(no previous exchanges)';

  return (
    `Conversation so far:\n${transcript}\n\n` +
    "Based on our conversation so far, what's a good follow-up question you would ask me as my mental health assistant?"
  );
}

// ============================================================================
// Anthropic Implementation
// ============================================================================

export class AnthropicFollowUpGenerator implements FollowUpGenerator {
  private rateLimiter: RateLimiter;

  constructor(
    private client: Anthropic,
    private model: string,
    requestsPerMinute: number
  ) {
    this.rateLimiter = new RateLimiter({ maxRequestsPerMinute: requestsPerMinute });
  }

  async generateFollowUp(context: FollowUpContext): Promise<string> {
    await this.rateLimiter.acquire();

    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: 200,
        temperature: 0.7,
        system: buildSystemPrompt(context),
        messages: [{ role: 'user', content: buildTranscript(context.history) }],
      });

      const content = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('\n')
        .trim();

      if (!content) {
        throw new AIServiceError('Empty follow-up question');
      }

      return content;
    } catch (error) {
      if (error instanceof AIServiceError) throw error;
      const err = toError(error);
      throw new AIServiceError(err.message, err);
    }
  }
}
