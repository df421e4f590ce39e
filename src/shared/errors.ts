// ============================================================================
// Base Error Classes
// ============================================================================

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

// ============================================================================
// HTTP Errors
// ============================================================================

export class BadRequestError extends AppError {
  constructor(message: string = 'Bad request') {
    super(message, 400, 'BAD_REQUEST');
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden') {
    super(message, 403, 'FORBIDDEN');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Not found') {
    super(message, 404, 'NOT_FOUND');
  }
}

export class ConflictError extends AppError {
  constructor(message: string = 'Conflict') {
    super(message, 409, 'CONFLICT');
  }
}

export class TooManyRequestsError extends AppError {
  public readonly retryAfterSeconds?: number;

  constructor(message: string = 'Too many requests', retryAfterSeconds?: number) {
    super(message, 429, 'RATE_LIMITED');
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

// ============================================================================
// Business Logic Errors
// ============================================================================

/** A reply arrived for a patient with no outstanding question. Logged, never retried. */
export class NoPendingMessageError extends AppError {
  public readonly patientId: string;

  constructor(patientId: string) {
    super(`No pending message for patient: ${patientId}`, 409, 'NO_PENDING_MESSAGE');
    this.patientId = patientId;
  }
}

export class PatientNotFoundError extends AppError {
  constructor(patientId: string) {
    super(`Patient not found: ${patientId}`, 404, 'PATIENT_NOT_FOUND');
  }
}

export class ProviderNotFoundError extends AppError {
  constructor(providerId: string) {
    super(`Provider not found: ${providerId}`, 404, 'PROVIDER_NOT_FOUND');
  }
}

export class ChannelNotBoundError extends AppError {
  constructor(patientId: string) {
    super(`Patient has no linked chat channel: ${patientId}`, 409, 'CHANNEL_NOT_BOUND');
  }
}

export class AlertAlreadyResolvedError extends AppError {
  constructor(alertId: string) {
    super(`Alert already resolved: ${alertId}`, 409, 'ALERT_ALREADY_RESOLVED');
  }
}

/**
 * The session moved on between planning a question and recording it
 * (another reply was scored in the meantime). The caller re-plans.
 */
export class StaleConversationStateError extends AppError {
  constructor(patientId: string, expected: number, actual: number) {
    super(
      `Conversation state changed for patient ${patientId}: expected ${expected} answered, found ${actual}`,
      409,
      'STALE_CONVERSATION_STATE'
    );
  }
}

// ============================================================================
// External Service Errors
// ============================================================================

export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly originalError?: Error;

  constructor(service: string, message: string, originalError?: Error) {
    super(`${service} error: ${message}`, 502, 'EXTERNAL_SERVICE_ERROR');
    this.service = service;
    this.originalError = originalError;
  }
}

export class AIServiceError extends ExternalServiceError {
  constructor(message: string, originalError?: Error) {
    super('AI', message, originalError);
  }
}

export class ClassifierError extends ExternalServiceError {
  constructor(message: string, originalError?: Error) {
    super('Classifier', message, originalError);
  }
}

export class ChannelSendError extends ExternalServiceError {
  public readonly chatId: string;

  constructor(chatId: string, message: string, originalError?: Error) {
    super('Telegram', message, originalError);
    this.chatId = chatId;
  }
}

// ============================================================================
// Database Errors
// ============================================================================

export class StorageError extends AppError {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(`Storage error: ${message}`, 500, 'STORAGE_ERROR', false);
    this.originalError = originalError;
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class ValidationError extends AppError {
  public readonly errors: Record<string, string[]>;

  constructor(errors: Record<string, string[]>) {
    const message = Object.entries(errors)
      .map(([field, messages]) => `${field}: ${messages.join(', ')}`)
      .join('; ');

    super(message, 400, 'VALIDATION_ERROR');
    this.errors = errors;
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isOperationalError(error: unknown): boolean {
  if (isAppError(error)) {
    return error.isOperational;
  }
  return false;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Check if error is retryable (transient)
 */
export function isRetryableError(error: unknown): boolean {
  if (isAppError(error)) {
    // Rate limits and service unavailable are retryable
    if (error.statusCode === 429 || error.statusCode === 503) {
      return true;
    }
    // External service errors might be transient
    if (error instanceof ExternalServiceError) {
      return true;
    }
    return false;
  }

  // Check for common transient error messages
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    const retryablePatterns = [
      'timeout',
      'econnreset',
      'econnrefused',
      'network',
      'temporarily unavailable',
      'rate limit',
      'too many requests',
    ];
    return retryablePatterns.some(pattern => message.includes(pattern));
  }

  return false;
}

/**
 * Retry a function with exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    shouldRetry?: (error: unknown) => boolean;
  } = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 10000,
    shouldRetry = isRetryableError,
  } = options;

  let lastError: unknown;
  let delay = initialDelayMs;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === maxRetries || !shouldRetry(error)) {
        throw error;
      }

      if (delay > 0) {
        await new Promise(resolve => setTimeout(resolve, delay));
      }

      // Exponential backoff with jitter
      delay = Math.min(delay * 2 + Math.random() * 1000, maxDelayMs);
    }
  }

  throw lastError;
}
