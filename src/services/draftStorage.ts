/**
 * Draft recovery — keeps the in-progress entry across a crash or reload.
 * Best effort: storage failures are logged and otherwise ignored.
 */
import { storageLogger } from '@/lib/logger';

const KEYS = {
  CONTENT: 'journal/draft_content',
  MOODS: 'journal/draft_moods',
} as const;

export interface JournalDraftSnapshot {
  content: string;
  moods: string[];
}

function parseMoods(raw: string | null): string[] {
  if (!raw) return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed)
      ? parsed.filter((mood): mood is string => typeof mood === 'string')
      : [];
  } catch {
    storageLogger.warn('Discarding unreadable draft moods');
    return [];
  }
}

export function loadDraft(storage: Storage = window.localStorage): JournalDraftSnapshot | null {
  try {
    const content = storage.getItem(KEYS.CONTENT);
    if (!content || content.trim().length === 0) {
      return null;
    }
    return { content, moods: parseMoods(storage.getItem(KEYS.MOODS)) };
  } catch (error) {
    storageLogger.warn({ err: error }, 'Error loading draft content');
    return null;
  }
}

export function clearDraft(storage: Storage = window.localStorage): void {
  try {
    storage.removeItem(KEYS.CONTENT);
    storage.removeItem(KEYS.MOODS);
  } catch (error) {
    storageLogger.warn({ err: error }, 'Error clearing draft content');
  }
}

export function saveDraft(
  content: string,
  moods: readonly string[],
  storage: Storage = window.localStorage
): void {
  if (content.trim().length === 0) {
    clearDraft(storage);
    return;
  }

  try {
    storage.setItem(KEYS.CONTENT, content);
    storage.setItem(KEYS.MOODS, JSON.stringify(moods));
  } catch (error) {
    storageLogger.warn({ err: error }, 'Error saving draft content');
  }
}
