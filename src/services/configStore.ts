/**
 * Config Storage — API key, setup state and feature toggles
 * Uses localStorage for persistent data.
 */
import { AppError, ErrorType } from '@/lib/errors';
import { storageLogger } from '@/lib/logger';

const KEYS = {
  CREDENTIAL: 'journal/claude_api_key',
  CONFIGURED: 'journal/app_configured',
  ANALYSIS_ENABLED: 'journal/analysis_enabled',
  DEMO_MODE: 'journal/demo_mode',
} as const;

export interface ConfigSnapshot {
  credential: string | null;
  configured: boolean;
  demoMode: boolean;
  analysisEnabled: boolean;
  isCredentialConfigured: boolean;
  isFullyConfigured: boolean;
  canRunDemo: boolean;
}

export interface ConfigStore {
  setCredential(apiKey: string): Promise<void>;
  clearCredential(): Promise<void>;
  setConfigured(configured: boolean): Promise<void>;
  setDemoMode(demoMode: boolean): Promise<void>;
  setAnalysisEnabled(enabled: boolean): Promise<void>;
  getSnapshot(): ConfigSnapshot;
  reset(): Promise<void>;
}

export function createConfigStore(
  getStorage: () => Storage = () => window.localStorage
): ConfigStore {
  const write = async (key: string, value: string): Promise<void> => {
    try {
      getStorage().setItem(key, value);
    } catch (error) {
      storageLogger.error({ key, err: error }, 'Config write failed');
      throw new AppError(`Could not save ${key}`, ErrorType.STORAGE, error);
    }
  };

  const remove = async (key: string): Promise<void> => {
    try {
      getStorage().removeItem(key);
    } catch (error) {
      storageLogger.error({ key, err: error }, 'Config remove failed');
      throw new AppError(`Could not remove ${key}`, ErrorType.STORAGE, error);
    }
  };

  const read = (key: string): string | null => {
    try {
      return getStorage().getItem(key);
    } catch (error) {
      storageLogger.warn({ key, err: error }, 'Config read failed, using default');
      return null;
    }
  };

  const readBool = (key: string, fallback: boolean): boolean => {
    const val = read(key);
    return val === null ? fallback : val === 'true';
  };

  const store: ConfigStore = {
    setCredential: (apiKey) => write(KEYS.CREDENTIAL, apiKey),

    clearCredential: () => remove(KEYS.CREDENTIAL),

    setConfigured: (configured) => write(KEYS.CONFIGURED, configured ? 'true' : 'false'),

    setDemoMode: (demoMode) => write(KEYS.DEMO_MODE, demoMode ? 'true' : 'false'),

    setAnalysisEnabled: (enabled) => write(KEYS.ANALYSIS_ENABLED, enabled ? 'true' : 'false'),

    getSnapshot: () => {
      const credential = read(KEYS.CREDENTIAL);
      const configured = readBool(KEYS.CONFIGURED, false);
      const isCredentialConfigured = Boolean(credential);

      return {
        credential,
        configured,
        demoMode: readBool(KEYS.DEMO_MODE, false),
        analysisEnabled: readBool(KEYS.ANALYSIS_ENABLED, true),
        isCredentialConfigured,
        isFullyConfigured: isCredentialConfigured && configured,
        // Auth is needed even for demo
        canRunDemo: configured,
      };
    },

    reset: async () => {
      await Promise.all([
        store.clearCredential(),
        store.setConfigured(false),
        store.setAnalysisEnabled(true),
        store.setDemoMode(false),
      ]);
    },
  };

  return store;
}

export const configStore = createConfigStore();
