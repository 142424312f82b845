/**
 * Client-side validation utilities
 */

import { APP_CONFIG } from '@/config/app';
import { err, ok, type Result } from './result';

export type ValidationError = 'empty' | 'badFormat';

export const VALIDATION_MESSAGES: Record<ValidationError, string> = {
  empty: 'Please enter your Claude API key',
  badFormat: 'Invalid Claude API key format',
};

/**
 * Checks the shape of an API key
 * @param raw - Key as typed by the user
 * @returns The trimmed key, or why it was rejected
 */
export function validateCredential(raw: string): Result<string, ValidationError> {
  const trimmed = raw.trim();

  if (trimmed.length === 0) {
    return err('empty');
  }

  if (!trimmed.startsWith(APP_CONFIG.CREDENTIAL_PREFIX)) {
    return err('badFormat');
  }

  return ok(trimmed);
}

/**
 * Deduplicates mood tags, keeping the first occurrence of each
 */
export function uniqueMoods(moods: readonly string[]): string[] {
  return Array.from(new Set(moods));
}

/**
 * Validates entry text content
 * @returns Error message or null if valid
 */
export function validateEntryText(text: string): string | null {
  if (text.trim().length === 0) {
    return 'Write a few words before saving';
  }

  if (text.length > APP_CONFIG.MAX_ENTRY_CHARS) {
    return `Entry is too long (max ${APP_CONFIG.MAX_ENTRY_CHARS} characters)`;
  }

  return null;
}
