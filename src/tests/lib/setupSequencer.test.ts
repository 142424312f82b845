/**
 * Setup Sequencer Tests
 * Ordering, short-circuiting and the single-attempt guard of first-run setup
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SetupError, SetupSequencer } from '../../lib/setupSequencer';
import { AppError, ErrorType } from '../../lib/errors';
import { err, ok, type Result } from '../../lib/result';
import type { AuthSession } from '../../types/api';
import type { ConfigStore } from '../../services/configStore';
import type { AuthService } from '../../services/authService';
import { createDeferred, createMockSession } from '../setup';

// ============================================================================
// Test Doubles
// ============================================================================

const createFakeConfig = (calls: string[]) => ({
  setCredential: vi.fn(async (apiKey: string) => {
    calls.push(`setCredential:${apiKey}`);
  }),
  clearCredential: vi.fn(async () => {
    calls.push('clearCredential');
  }),
  setConfigured: vi.fn(async (configured: boolean) => {
    calls.push(`setConfigured:${configured}`);
  }),
  setDemoMode: vi.fn(async (demoMode: boolean) => {
    calls.push(`setDemoMode:${demoMode}`);
  }),
  setAnalysisEnabled: vi.fn(async (enabled: boolean) => {
    calls.push(`setAnalysisEnabled:${enabled}`);
  }),
  getSnapshot: vi.fn(),
  reset: vi.fn(async () => {}),
}) satisfies ConfigStore;

const createFakeAuth = (calls: string[]) => ({
  authenticateAnonymously: vi.fn(async (): Promise<Result<AuthSession, AppError>> => {
    calls.push('authenticate');
    return ok(createMockSession());
  }),
  signOut: vi.fn(),
}) satisfies AuthService;

// ============================================================================
// Test Suite
// ============================================================================

describe('SetupSequencer', () => {
  let calls: string[];
  let config: ReturnType<typeof createFakeConfig>;
  let auth: ReturnType<typeof createFakeAuth>;
  let sequencer: SetupSequencer;

  beforeEach(() => {
    calls = [];
    config = createFakeConfig(calls);
    auth = createFakeAuth(calls);
    sequencer = new SetupSequencer({ config, auth });
  });

  describe('API key mode', () => {
    it('writes configuration and then authenticates', async () => {
      const result = await sequencer.runSetup({ kind: 'apiKey', credential: 'sk-ant-abc123' });

      expect(result).toEqual({ ok: true, value: undefined });
      expect(calls).toEqual([
        'setCredential:sk-ant-abc123',
        'setConfigured:true',
        'setDemoMode:false',
        'authenticate',
      ]);
    });

    it('never touches the analysis flag', async () => {
      await sequencer.runSetup({ kind: 'apiKey', credential: 'sk-ant-abc123' });

      expect(config.setAnalysisEnabled).not.toHaveBeenCalled();
    });
  });

  describe('demo mode', () => {
    it('disables analysis and authenticates', async () => {
      const result = await sequencer.runSetup({ kind: 'demo' });

      expect(result?.ok).toBe(true);
      expect(calls).toEqual([
        'setDemoMode:true',
        'setConfigured:true',
        'setAnalysisEnabled:false',
        'authenticate',
      ]);
      expect(config.setCredential).not.toHaveBeenCalled();
    });
  });

  describe('status', () => {
    it('starts idle', () => {
      expect(sequencer.getStatus()).toBe('idle');
      expect(sequencer.isBusy).toBe(false);
    });

    it('is running while the attempt is pending', async () => {
      const pendingAuth = createDeferred<void>();
      auth.authenticateAnonymously.mockImplementationOnce(async () => {
        calls.push('authenticate');
        await pendingAuth.promise;
        return ok(createMockSession());
      });

      const run = sequencer.runSetup({ kind: 'demo' });
      expect(sequencer.getStatus()).toBe('running');
      expect(sequencer.isBusy).toBe(true);

      pendingAuth.resolve();
      await run;
    });

    it('ends succeeded and not busy when both stages pass', async () => {
      await sequencer.runSetup({ kind: 'apiKey', credential: 'sk-ant-abc123' });

      expect(sequencer.getStatus()).toBe('succeeded');
      expect(sequencer.isBusy).toBe(false);
    });
  });

  describe('failures', () => {
    it('stops before authentication when a config write fails', async () => {
      config.setConfigured.mockRejectedValueOnce(
        new AppError('Could not save journal/app_configured', ErrorType.STORAGE)
      );

      const result = await sequencer.runSetup({ kind: 'apiKey', credential: 'sk-ant-abc123' });

      expect(result?.ok).toBe(false);
      if (result && !result.ok) {
        expect(result.error).toBeInstanceOf(SetupError);
        expect(result.error.stage).toBe('configWrite');
        expect(result.error.reason).toBe('Could not save journal/app_configured');
      }
      expect(auth.authenticateAnonymously).not.toHaveBeenCalled();
      expect(config.setDemoMode).not.toHaveBeenCalled();
      expect(sequencer.getStatus()).toBe('failed');
      expect(sequencer.isBusy).toBe(false);
    });

    it('reports an auth failure and keeps the written configuration', async () => {
      auth.authenticateAnonymously.mockResolvedValueOnce(
        err(new AppError('Network down', ErrorType.NETWORK))
      );

      const result = await sequencer.runSetup({ kind: 'demo' });

      expect(result).toEqual({ ok: false, error: expect.any(SetupError) });
      if (result && !result.ok) {
        expect(result.error.stage).toBe('auth');
        expect(result.error.reason).toBe('Network down');
        expect(result.error.cause).toMatchObject({ message: 'Network down', type: ErrorType.NETWORK });
        expect(result.error.type).toBe(ErrorType.AUTH);
      }
      expect(config.reset).not.toHaveBeenCalled();
      expect(config.clearCredential).not.toHaveBeenCalled();
      expect(sequencer.getStatus()).toBe('failed');
    });

    it('treats a thrown auth error as an auth failure', async () => {
      auth.authenticateAnonymously.mockRejectedValueOnce(new Error('boom'));

      const result = await sequencer.runSetup({ kind: 'demo' });

      expect(result).toEqual({ ok: false, error: expect.any(SetupError) });
      if (result && !result.ok) {
        expect(result.error.stage).toBe('auth');
        expect(result.error.reason).toBe('boom');
        expect(result.error.cause).toBeInstanceOf(Error);
      }
      expect(sequencer.isBusy).toBe(false);
    });

    it('can be retried after a failure', async () => {
      auth.authenticateAnonymously.mockResolvedValueOnce(
        err(new AppError('Network down', ErrorType.NETWORK))
      );

      await sequencer.runSetup({ kind: 'demo' });
      const retry = await sequencer.runSetup({ kind: 'demo' });

      expect(retry?.ok).toBe(true);
      expect(auth.authenticateAnonymously).toHaveBeenCalledTimes(2);
      expect(sequencer.getStatus()).toBe('succeeded');
    });
  });

  describe('concurrency guard', () => {
    it('ignores a second run while the first is pending', async () => {
      const pendingWrite = createDeferred<void>();
      config.setDemoMode.mockImplementationOnce(async (demoMode: boolean) => {
        calls.push(`setDemoMode:${demoMode}`);
        await pendingWrite.promise;
      });

      const first = sequencer.runSetup({ kind: 'demo' });
      const second = await sequencer.runSetup({ kind: 'apiKey', credential: 'sk-ant-abc123' });

      expect(second).toBeNull();
      expect(calls).toEqual(['setDemoMode:true']);

      pendingWrite.resolve();
      await first;

      expect(config.setCredential).not.toHaveBeenCalled();
      expect(config.setDemoMode).toHaveBeenCalledTimes(1);
      expect(auth.authenticateAnonymously).toHaveBeenCalledTimes(1);
    });

    it('ignores runs after success until reset', async () => {
      await sequencer.runSetup({ kind: 'demo' });

      expect(await sequencer.runSetup({ kind: 'demo' })).toBeNull();
      expect(auth.authenticateAnonymously).toHaveBeenCalledTimes(1);

      sequencer.reset();
      expect(sequencer.getStatus()).toBe('idle');

      const again = await sequencer.runSetup({ kind: 'demo' });
      expect(again?.ok).toBe(true);
      expect(auth.authenticateAnonymously).toHaveBeenCalledTimes(2);
    });
  });
});
