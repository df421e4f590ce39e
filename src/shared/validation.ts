/**
 * Validation utilities shared by the HTTP layer and the inbound router
 */

export const VERIFICATION_CODE_LENGTH = 6;
export const VERIFICATION_CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/**
 * Sanitize user input for safe storage
 * - Trim whitespace
 * - Remove control characters
 * - Limit length
 */
export function sanitizeInput(input: string, maxLength: number = 1000): string {
  return input
    .trim()
    // Remove control characters except newlines
    .replace(/[\x00-\x09\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .substring(0, maxLength);
}

export function normalizeVerificationCode(code: string): string {
  return code.trim().toUpperCase();
}

export function isValidVerificationCode(code: string): boolean {
  const pattern = new RegExp(`^[A-Z0-9]{${VERIFICATION_CODE_LENGTH}}$`);
  return pattern.test(normalizeVerificationCode(code));
}
