import { logger as rootLogger, Logger } from '../../infra/logging/logger';
import {
  ChannelNotBoundError,
  NoPendingMessageError,
  StaleConversationStateError,
  toError,
} from '../../shared/errors';
import {
  ChatChannel,
  MessageRecord,
  PROFESSIONAL_KEYBOARD,
  QuestionStage,
} from '../../shared/types';
import { classifyWithFallback, SentimentClassifier } from '../ai/sentiment';
import { FALLBACK_FOLLOW_UP, FollowUpGenerator } from '../ai/dialogue';
import { clampScore, roundTo } from '../scoring/aggregates';
import type { ConversationSnapshot, RecordReplyResult, ScoreStore } from '../scoring/store';
import { bankQuestion, DEFAULT_QUESTIONS } from './questions';

const MAX_PLAN_ATTEMPTS = 3;
const FOLLOW_UP_HISTORY = 5;

// ============================================================================
// State
// ============================================================================

export type ConversationState =
  | { kind: 'not_started_today' }
  | { kind: 'question_bank'; index: number }
  | { kind: 'free_form' };

export interface ResolvedState {
  state: ConversationState;
  /** Outstanding question, if any; may belong to an earlier day's session */
  awaiting: MessageRecord | null;
}

/**
 * Derive where today's conversation stands. `index` is the bank question
 * the next check-in will ask.
 */
export function resolveState(snapshot: ConversationSnapshot, bankSize: number): ResolvedState {
  const { session, pending } = snapshot;
  const answered = session?.answeredCount ?? 0;

  let state: ConversationState;
  if (!session || (session.stage === 'not_started' && answered === 0)) {
    state = { kind: 'not_started_today' };
  } else if (answered < bankSize) {
    state = { kind: 'question_bank', index: answered };
  } else {
    state = { kind: 'free_form' };
  }

  return { state, awaiting: pending };
}

// ============================================================================
// Engine
// ============================================================================

export interface ConversationEngineOptions {
  questions?: readonly string[];
  classifierRetries: number;
  classifierInitialDelayMs?: number;
  classifierMaxDelayMs?: number;
}

export interface CheckinResult {
  patientId: string;
  messageId: string;
  question: string;
  stage: QuestionStage;
  /** False when the channel send failed; the question stays recorded as pending */
  delivered: boolean;
}

export interface ReplyResult {
  score: number;
  /** True when the classifier failed and the neutral score was used */
  fallbackScore: boolean;
  recorded: RecordReplyResult;
  next: CheckinResult;
}

interface PlannedQuestion {
  text: string;
  stage: QuestionStage;
  answeredCount: number;
}

export class ConversationEngine {
  private questions: readonly string[];
  private log: Logger;

  constructor(
    private store: ScoreStore,
    private channel: ChatChannel,
    private classifier: SentimentClassifier,
    private generator: FollowUpGenerator,
    private options: ConversationEngineOptions,
    log: Logger = rootLogger
  ) {
    this.questions = options.questions ?? DEFAULT_QUESTIONS;
    this.log = log.child({ component: 'conversation-engine' });
  }

  async getState(patientId: string): Promise<ResolvedState> {
    const snapshot = await this.store.getConversationSnapshot(patientId);
    return resolveState(snapshot, this.questions.length);
  }

  /**
   * Send the next question of today's check-in and record it as pending.
   * Exactly one question is recorded and one send attempted per call.
   */
  async checkin(patientId: string): Promise<CheckinResult> {
    for (let attempt = 1; ; attempt++) {
      const snapshot = await this.store.getConversationSnapshot(patientId);
      const chatId = snapshot.patient.chatId;
      if (!chatId) {
        throw new ChannelNotBoundError(patientId);
      }

      const plan = await this.planNextQuestion(snapshot);

      let message: MessageRecord;
      try {
        message = await this.store.recordQuestion(patientId, snapshot.today, plan.text, {
          stage: plan.stage,
          expectedAnsweredCount: plan.answeredCount,
        });
      } catch (error) {
        if (error instanceof StaleConversationStateError && attempt < MAX_PLAN_ATTEMPTS) {
          this.log.info({ patientId, attempt }, 'Conversation moved on while planning, re-planning');
          continue;
        }
        throw error;
      }

      const delivered = await this.deliver(patientId, chatId, plan.text);

      this.log.info(
        { patientId, messageId: message.id, stage: plan.stage, answered: plan.answeredCount, delivered },
        'Check-in question recorded'
      );

      return {
        patientId,
        messageId: message.id,
        question: plan.text,
        stage: plan.stage,
        delivered,
      };
    }
  }

  /**
   * Score a reply against the outstanding question, then move straight on to
   * the next question.
   */
  async handleReply(patientId: string, replyText: string): Promise<ReplyResult> {
    const pending = await this.store.findPendingMessage(patientId);
    if (!pending) {
      throw new NoPendingMessageError(patientId);
    }

    const snapshot = await this.store.getConversationSnapshot(patientId);
    if (!snapshot.session) {
      await this.store.getOrCreateSession(patientId, snapshot.today);
    }

    const classification = await classifyWithFallback(
      this.classifier,
      `Question: ${pending.question} Response: ${replyText}`,
      {
        maxRetries: this.options.classifierRetries,
        initialDelayMs: this.options.classifierInitialDelayMs,
        maxDelayMs: this.options.classifierMaxDelayMs,
        log: this.log,
      }
    );
    const score = roundTo(clampScore(classification.score), 2);

    const recorded = await this.store.recordReply(
      { patientId, messageId: pending.id },
      replyText,
      score
    );

    this.log.info(
      {
        patientId,
        messageId: recorded.message.id,
        score,
        fallback: classification.fallback,
        sessionScore: recorded.session.sessionScore,
      },
      'Reply scored'
    );

    const next = await this.checkin(patientId);

    return { score, fallbackScore: classification.fallback, recorded, next };
  }

  // ============================================================================
  // Planning & Delivery
  // ============================================================================

  private async planNextQuestion(snapshot: ConversationSnapshot): Promise<PlannedQuestion> {
    const answeredCount = snapshot.session?.answeredCount ?? 0;
    const fromBank = bankQuestion(this.questions, answeredCount, snapshot.patient.name);

    if (fromBank !== null) {
      return { text: fromBank, stage: 'question_bank', answeredCount };
    }

    return { text: await this.followUp(snapshot), stage: 'free_form', answeredCount };
  }

  private async followUp(snapshot: ConversationSnapshot): Promise<string> {
    const { patient } = snapshot;

    try {
      const history = await this.store.recentScoredMessages(patient.id, FOLLOW_UP_HISTORY);
      return await this.generator.generateFollowUp({
        patientName: patient.name,
        condition: patient.condition,
        history,
      });
    } catch (error) {
      this.log.warn(
        { patientId: patient.id, error: toError(error).message },
        'Follow-up generation failed, using fallback question'
      );
      return FALLBACK_FOLLOW_UP;
    }
  }

  private async deliver(patientId: string, chatId: string, text: string): Promise<boolean> {
    try {
      await this.channel.send(chatId, text, PROFESSIONAL_KEYBOARD);
      return true;
    } catch (error) {
      this.log.error(
        { patientId, chatId, error: toError(error).message },
        'Failed to deliver check-in question, leaving it pending'
      );
      return false;
    }
  }
}
