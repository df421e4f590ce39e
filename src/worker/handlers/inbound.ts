import type { Logger } from '../../infra/logging/logger';
import { parseTimeOfDay } from '../../shared/dates';
import { NoPendingMessageError, toError } from '../../shared/errors';
import { sanitizeInput } from '../../shared/validation';
import {
  ChatChannel,
  CONTACT_PROFESSIONAL_LABEL,
  InboundJobData,
  JobResult,
  PROFESSIONAL_KEYBOARD,
  ReplyKeyboard,
} from '../../shared/types';
import type { AlertEngine } from '../../domain/alerts/engine';
import type { ConversationEngine } from '../../domain/conversation/engine';
import type { PatientService } from '../../domain/patients/service';
import {
  checkinTimeUpdated,
  HELP_REQUEST_FAILED,
  HELP_REQUEST_SENT,
  INVALID_CODE,
  INVALID_TIME,
  LINK_INSTRUCTIONS,
  patientLinked,
  PROVIDER_FREE_TEXT,
  providerLinked,
} from '../messages';

export interface InboundDeps {
  patients: Pick<PatientService, 'linkChannel' | 'findUserByChatId' | 'updatePreferredTime'>;
  engine: Pick<ConversationEngine, 'handleReply'>;
  alerts: Pick<AlertEngine, 'requestProfessionalHelp'>;
  channel: ChatChannel;
}

const START_COMMAND = /^\/start(?:@\w+)?(?:\s+(\S+))?\s*$/;
const TIME_SHAPED = /^\d{1,2}:\d{2}$/;

/**
 * Route one inbound chat message, in order: `/start` linking, a bare time of
 * day, the help button, then a reply to the outstanding question.
 */
export async function handleInboundMessage(
  data: InboundJobData,
  deps: InboundDeps,
  log: Logger
): Promise<JobResult> {
  const { chatId, correlationId } = data;
  const text = sanitizeInput(data.text, 4000);

  const done = (action: string, status: JobResult['status'] = 'completed'): JobResult => ({
    status,
    correlationId,
    action,
  });

  const reply = async (message: string, keyboard?: ReplyKeyboard): Promise<void> => {
    try {
      await deps.channel.send(chatId, message, keyboard);
    } catch (error) {
      log.error({ chatId, error: toError(error).message }, 'Failed to send reply');
    }
  };

  if (!text) {
    return done('empty_message', 'skipped');
  }

  // --------------------------------------------------------------------------
  // Channel linking
  // --------------------------------------------------------------------------

  const start = START_COMMAND.exec(text);
  if (start) {
    const code = start[1];
    if (!code) {
      await reply(LINK_INSTRUCTIONS);
      return done('link_instructions');
    }

    const user = await deps.patients.linkChannel(code, chatId);
    if (!user) {
      log.info({ chatId }, 'Invalid verification code');
      await reply(INVALID_CODE);
      return done('link_invalid');
    }

    if (user.role === 'patient') {
      await reply(patientLinked(user.patient.name, user.patient.preferredTime), PROFESSIONAL_KEYBOARD);
    } else {
      await reply(providerLinked(user.provider.name));
    }
    return done('linked');
  }

  const user = await deps.patients.findUserByChatId(chatId);
  if (!user) {
    log.info({ chatId }, 'Message from unlinked chat');
    await reply(LINK_INSTRUCTIONS);
    return done('unknown_chat', 'skipped');
  }

  if (user.role === 'provider') {
    await reply(PROVIDER_FREE_TEXT);
    return done('provider_message');
  }

  const patientId = user.patient.id;

  // --------------------------------------------------------------------------
  // Check-in time preference
  // --------------------------------------------------------------------------

  // Anything shaped like HH:MM is a time request, never a check-in answer
  if (TIME_SHAPED.test(text)) {
    const stored = parseTimeOfDay(text) ? await deps.patients.updatePreferredTime(patientId, text) : null;
    if (!stored) {
      await reply(INVALID_TIME, PROFESSIONAL_KEYBOARD);
      return done('time_invalid');
    }
    await reply(checkinTimeUpdated(stored), PROFESSIONAL_KEYBOARD);
    return done('time_updated');
  }

  // --------------------------------------------------------------------------
  // Professional help
  // --------------------------------------------------------------------------

  if (text === CONTACT_PROFESSIONAL_LABEL) {
    try {
      const { notified } = await deps.alerts.requestProfessionalHelp(patientId);
      log.info({ patientId, notified }, 'Help request handled');
      await reply(HELP_REQUEST_SENT, PROFESSIONAL_KEYBOARD);
      return done('help_requested');
    } catch (error) {
      log.error({ patientId, error: toError(error).message }, 'Help request failed');
      await reply(HELP_REQUEST_FAILED, PROFESSIONAL_KEYBOARD);
      return done('help_requested', 'failed');
    }
  }

  // --------------------------------------------------------------------------
  // Reply to the outstanding question
  // --------------------------------------------------------------------------

  try {
    const result = await deps.engine.handleReply(patientId, text);
    log.info(
      { patientId, score: result.score, fallback: result.fallbackScore, nextDelivered: result.next.delivered },
      'Reply processed'
    );
    return done('reply_scored');
  } catch (error) {
    if (error instanceof NoPendingMessageError) {
      log.info({ patientId }, 'Free message with no outstanding question, not scored');
      return done('no_pending', 'skipped');
    }
    throw error;
  }
}
