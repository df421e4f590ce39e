import type {
  AlertRecord,
  AlertStatus,
  AlertType,
  ConversationStage,
  MessageRecord,
  PatientRecord,
  ProviderRecord,
  QuestionStage,
  SessionRecord,
} from '../../shared/types';
import type { AlertWithPatient } from '../../domain/alerts/repository';

// ============================================================================
// Column Lists
// ============================================================================

export const PATIENT_COLUMNS = `
  id, name, email, condition, timezone, preferred_time, chat_id,
  cumulative_score, day_over_day_delta, three_day_delta, created_at`;

export const PROVIDER_COLUMNS = `
  id, name, email, specialty, license_number, institution, chat_id, created_at`;

export const SESSION_COLUMNS = `
  id, patient_id, to_char(session_date, 'YYYY-MM-DD') AS session_day,
  session_score, stage, answered_count, created_at`;

export const MESSAGE_COLUMNS = `
  id, patient_id, session_id, question, response, score, stage, created_at, answered_at`;

export const ALERT_COLUMNS = `
  id, patient_id, type, message, status, created_at, resolved_at`;

// ============================================================================
// Row Types
// ============================================================================

export type PatientRow = {
  id: string;
  name: string;
  email: string;
  condition: string | null;
  timezone: string;
  preferred_time: string | null;
  chat_id: string | null;
  cumulative_score: number;
  day_over_day_delta: number;
  three_day_delta: number;
  created_at: Date;
};

export type ProviderRow = {
  id: string;
  name: string;
  email: string;
  specialty: string | null;
  license_number: string | null;
  institution: string | null;
  chat_id: string | null;
  created_at: Date;
};

export type SessionRow = {
  id: string;
  patient_id: string;
  session_day: string;
  session_score: number;
  stage: string;
  answered_count: number;
  created_at: Date;
};

export type MessageRow = {
  id: string;
  patient_id: string;
  session_id: string;
  question: string;
  response: string;
  score: number | null;
  stage: string;
  created_at: Date;
  answered_at: Date | null;
};

export type AlertRow = {
  id: string;
  patient_id: string;
  type: string;
  message: string;
  status: string;
  created_at: Date;
  resolved_at: Date | null;
};

export type AlertWithPatientRow = AlertRow & { patient_name: string };

// ============================================================================
// Mappers
// ============================================================================

function toConversationStage(value: string): ConversationStage {
  return value === 'question_bank' || value === 'free_form' ? value : 'not_started';
}

function toQuestionStage(value: string): QuestionStage {
  return value === 'free_form' ? 'free_form' : 'question_bank';
}

function toAlertType(value: string): AlertType {
  return value === 'low_sentiment' ? 'low_sentiment' : 'professional_help';
}

function toAlertStatus(value: string): AlertStatus {
  return value === 'resolved' ? 'resolved' : 'pending';
}

export function toPatient(row: PatientRow): PatientRecord {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    condition: row.condition,
    timezone: row.timezone,
    preferredTime: row.preferred_time,
    chatId: row.chat_id,
    cumulativeScore: row.cumulative_score,
    dayOverDayDelta: row.day_over_day_delta,
    threeDayDelta: row.three_day_delta,
    createdAt: row.created_at,
  };
}

export function toProvider(row: ProviderRow): ProviderRecord {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    specialty: row.specialty,
    licenseNumber: row.license_number,
    institution: row.institution,
    chatId: row.chat_id,
    createdAt: row.created_at,
  };
}

export function toSession(row: SessionRow): SessionRecord {
  return {
    id: row.id,
    patientId: row.patient_id,
    date: row.session_day,
    sessionScore: row.session_score,
    stage: toConversationStage(row.stage),
    answeredCount: row.answered_count,
    createdAt: row.created_at,
  };
}

export function toMessage(row: MessageRow): MessageRecord {
  return {
    id: row.id,
    patientId: row.patient_id,
    sessionId: row.session_id,
    question: row.question,
    response: row.response,
    score: row.score,
    stage: toQuestionStage(row.stage),
    createdAt: row.created_at,
    answeredAt: row.answered_at,
  };
}

export function toAlert(row: AlertRow): AlertRecord {
  return {
    id: row.id,
    patientId: row.patient_id,
    type: toAlertType(row.type),
    message: row.message,
    status: toAlertStatus(row.status),
    createdAt: row.created_at,
    resolvedAt: row.resolved_at,
  };
}

export function toAlertWithPatient(row: AlertWithPatientRow): AlertWithPatient {
  return { ...toAlert(row), patientName: row.patient_name };
}
