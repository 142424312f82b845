/**
 * First-run setup: persist the chosen configuration, then authenticate.
 *
 * The two stages run strictly in order and the first failure ends the run.
 * Configuration written by a run whose auth stage fails is left in place.
 */

import type { AuthService } from '@/services/authService';
import type { ConfigStore } from '@/services/configStore';
import { AppError, ErrorType, getUserMessage } from './errors';
import { setupLogger } from './logger';
import { andThenAsync, err, ok, type Result } from './result';

export type SetupMode = { kind: 'apiKey'; credential: string } | { kind: 'demo' };

export type SetupStage = 'configWrite' | 'auth';

export type SetupStatus = 'idle' | 'running' | 'succeeded' | 'failed';

/**
 * `reason` is the user-facing text of the failed stage; the error that
 * caused it stays on the standard `cause`.
 */
export class SetupError extends AppError {
  constructor(
    public stage: SetupStage,
    public reason: string,
    cause?: unknown
  ) {
    super(reason, stage === 'auth' ? ErrorType.AUTH : ErrorType.STORAGE, cause);
    this.name = 'SetupError';
    this.cause = cause;
  }
}

export type SetupResult = Result<void, SetupError>;

export interface SetupDependencies {
  config: ConfigStore;
  auth: AuthService;
}

export class SetupSequencer {
  private status: SetupStatus = 'idle';

  constructor(private readonly deps: SetupDependencies) {}

  getStatus(): SetupStatus {
    return this.status;
  }

  get isBusy(): boolean {
    return this.status === 'running';
  }

  /**
   * Resolves to null, without touching config or auth, while another run is
   * pending or after a run has succeeded.
   */
  async runSetup(mode: SetupMode): Promise<SetupResult | null> {
    if (this.status === 'running' || this.status === 'succeeded') {
      setupLogger.debug({ status: this.status, mode: mode.kind }, 'Setup request ignored');
      return null;
    }

    this.status = 'running';
    setupLogger.info({ mode: mode.kind }, 'Setup started');

    try {
      const result = await andThenAsync(await this.persistConfig(mode), () => this.authenticate());

      this.status = result.ok ? 'succeeded' : 'failed';
      if (result.ok) {
        setupLogger.info({ mode: mode.kind }, 'Setup completed');
      } else {
        setupLogger.warn(
          { mode: mode.kind, stage: result.error.stage, error: result.error.reason },
          'Setup failed'
        );
      }
      return result;
    } finally {
      if (this.status === 'running') {
        this.status = 'failed';
      }
    }
  }

  /**
   * Back to idle so a finished sequencer can run again
   */
  reset(): void {
    if (this.status !== 'running') {
      this.status = 'idle';
    }
  }

  private async persistConfig(mode: SetupMode): Promise<SetupResult> {
    const { config } = this.deps;

    try {
      if (mode.kind === 'apiKey') {
        await config.setCredential(mode.credential);
        await config.setConfigured(true);
        await config.setDemoMode(false);
      } else {
        await config.setDemoMode(true);
        await config.setConfigured(true);
        await config.setAnalysisEnabled(false);
      }
      return ok(undefined);
    } catch (error) {
      return err(new SetupError('configWrite', getUserMessage(error), error));
    }
  }

  private async authenticate(): Promise<SetupResult> {
    try {
      const session = await this.deps.auth.authenticateAnonymously();
      return session.ok
        ? ok(undefined)
        : err(new SetupError('auth', session.error.message, session.error));
    } catch (error) {
      return err(new SetupError('auth', getUserMessage(error), error));
    }
  }
}
