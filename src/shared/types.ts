// ============================================================================
// Sentinels
// ============================================================================

/** Response text of a question that has been sent but not yet answered. */
export const AWAITING_RESPONSE = 'Awaiting Response';

/** Response text of a question superseded by a newer one before it was answered. */
export const ABANDONED_RESPONSE = 'No Response';

/** Session score held by a session that has no scored message yet. */
export const PLACEHOLDER_SESSION_SCORE = 0.5;

export const CONTACT_PROFESSIONAL_LABEL = 'Contact a professional';

// ============================================================================
// Job Types
// ============================================================================

export interface InboundJobData {
  type: 'inbound_message';
  correlationId: string;
  chatId: string;
  text: string;
  senderName?: string;
  timestamp: string;
}

export interface CheckinJobData {
  type: 'scheduled_checkin';
  correlationId: string;
  patientId: string;
  localDate: string;
  scheduledTime: string;
}

export interface TickJobData {
  type: 'scheduler_tick';
}

export interface JobResult {
  status: 'completed' | 'failed' | 'skipped';
  correlationId: string;
  action?: string;
  error?: string;
}

// ============================================================================
// People
// ============================================================================

export interface PatientRecord {
  id: string;
  name: string;
  email: string;
  condition: string | null;
  timezone: string;
  /** HH:MM in the patient's timezone, null when not configured */
  preferredTime: string | null;
  chatId: string | null;
  cumulativeScore: number;
  dayOverDayDelta: number;
  threeDayDelta: number;
  createdAt: Date;
}

export interface ProviderRecord {
  id: string;
  name: string;
  email: string;
  specialty: string | null;
  licenseNumber: string | null;
  institution: string | null;
  chatId: string | null;
  createdAt: Date;
}

export type ChannelUser =
  | { role: 'patient'; patient: PatientRecord }
  | { role: 'provider'; provider: ProviderRecord };

export type UserRole = ChannelUser['role'];

export interface PatientAggregates {
  cumulativeScore: number;
  dayOverDayDelta: number;
  threeDayDelta: number;
}

// ============================================================================
// Sessions & Messages
// ============================================================================

export type ConversationStage = 'not_started' | 'question_bank' | 'free_form';

export type QuestionStage = Exclude<ConversationStage, 'not_started'>;

export interface SessionRecord {
  id: string;
  patientId: string;
  /** Patient-local calendar date, YYYY-MM-DD */
  date: string;
  sessionScore: number;
  stage: ConversationStage;
  answeredCount: number;
  createdAt: Date;
}

export interface MessageRecord {
  id: string;
  patientId: string;
  sessionId: string;
  question: string;
  response: string;
  score: number | null;
  stage: QuestionStage;
  createdAt: Date;
  answeredAt: Date | null;
}

export function isPending(message: Pick<MessageRecord, 'response'>): boolean {
  return message.response === AWAITING_RESPONSE;
}

export function isScoredSession(session: Pick<SessionRecord, 'answeredCount'>): boolean {
  return session.answeredCount > 0;
}

// ============================================================================
// Alerts
// ============================================================================

export type AlertType = 'professional_help' | 'low_sentiment';

export type AlertStatus = 'pending' | 'resolved';

export interface AlertRecord {
  id: string;
  patientId: string;
  type: AlertType;
  message: string;
  status: AlertStatus;
  createdAt: Date;
  resolvedAt: Date | null;
}

// ============================================================================
// Chat Channel
// ============================================================================

export interface ReplyKeyboard {
  keyboard: string[][];
  resize_keyboard: boolean;
  one_time_keyboard: boolean;
  persistent: boolean;
}

export interface ChatChannel {
  send(chatId: string, text: string, keyboard?: ReplyKeyboard): Promise<void>;
}

export const PROFESSIONAL_KEYBOARD: ReplyKeyboard = {
  keyboard: [[CONTACT_PROFESSIONAL_LABEL]],
  resize_keyboard: true,
  one_time_keyboard: false,
  persistent: true,
};

// ============================================================================
// Clock
// ============================================================================

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
