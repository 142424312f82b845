/**
 * Authentication — anonymous sign-in against the journal backend
 */
import type { AuthSession } from '@/types/api';
import { api } from '@/lib/api';
import { AppError, ErrorType, toAppError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { err, ok, type Result } from '@/lib/result';
import { useSessionStore } from '@/store/useSessionStore';

const authLogger = createLogger('auth');

export interface AuthService {
  authenticateAnonymously(): Promise<Result<AuthSession, AppError>>;
  signOut(): void;
}

export function createAuthService(client: Pick<typeof api, 'auth'> = api): AuthService {
  return {
    async authenticateAnonymously() {
      try {
        const session = await client.auth.signInAnonymously();
        useSessionStore.getState().setSession(session);
        authLogger.info({ userId: session.userId }, 'Signed in anonymously');
        return ok(session);
      } catch (error) {
        const appError = toAppError(error, ErrorType.AUTH, 'Failed to sign in anonymously');
        authLogger.warn({ error: appError.message, type: appError.type }, 'Anonymous sign-in failed');
        return err(appError);
      }
    },

    signOut() {
      useSessionStore.getState().clearSession();
    },
  };
}

export const authService = createAuthService();
