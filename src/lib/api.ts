import type { AuthSession, CreateEntryInput, JournalEntry } from '@/types/api';
import { APP_CONFIG } from '@/config/app';
import { useSessionStore } from '@/store/useSessionStore';
import { AppError, ErrorType, getUserMessage } from './errors';
import { apiLogger } from './logger';

/**
 * Base fetch wrapper with auth and timeout
 */
async function apiFetch<T>(
  endpoint: string,
  options: Omit<RequestInit, 'headers' | 'signal'> = {}
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), APP_CONFIG.API_TIMEOUT_MS);
  const authToken = useSessionStore.getState().session?.token;

  try {
    const response = await fetch(`${APP_CONFIG.API_BASE}${endpoint}`, {
      ...options,
      signal: controller.signal,
      headers: {
        'Content-Type': 'application/json',
        ...(authToken ? { Authorization: `Bearer ${authToken}` } : {}),
      },
    });

    if (!response.ok) {
      const body: unknown = await response.json().catch(() => null);
      const message = getUserMessage(body, `HTTP ${response.status}`);
      apiLogger.warn({ endpoint, status: response.status }, 'Request failed');

      throw new AppError(
        message,
        response.status === 401 || response.status === 403 ? ErrorType.AUTH : ErrorType.SERVER,
        { status: response.status }
      );
    }

    return response.json();
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    if (error instanceof Error && error.name === 'AbortError') {
      throw new AppError('Request timed out', ErrorType.TIMEOUT);
    }
    throw new AppError(getUserMessage(error, 'Network request failed'), ErrorType.NETWORK, error);
  } finally {
    clearTimeout(timeoutId);
  }
}

// ============================================
// AUTH API
// ============================================

export async function signInAnonymously(): Promise<AuthSession> {
  return apiFetch<AuthSession>('/auth/anonymous', { method: 'POST' });
}

// ============================================
// ENTRIES API
// ============================================

export async function createEntry(input: CreateEntryInput): Promise<JournalEntry> {
  return apiFetch<JournalEntry>('/entries', {
    method: 'POST',
    body: JSON.stringify(input),
  });
}

export const api = {
  auth: {
    signInAnonymously,
  },
  entries: {
    create: createEntry,
  },
};
