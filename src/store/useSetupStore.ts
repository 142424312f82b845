import { create } from 'zustand';
import { configStore } from '@/services/configStore';
import { authService } from '@/services/authService';
import { getUserMessage, logError } from '@/lib/errors';
import { setupLogger } from '@/lib/logger';
import { SetupSequencer, type SetupMode, type SetupStatus } from '@/lib/setupSequencer';
import { validateCredential, type ValidationError } from '@/lib/validation';

interface SetupState {
  // Form
  credential: string;
  showCredential: boolean;
  validationError: ValidationError | null;

  // Attempt
  isDemoMode: boolean;
  isLoading: boolean;
  errorMessage: string | null;
  status: SetupStatus;

  // Actions
  setCredential: (value: string) => void;
  toggleShowCredential: () => void;
  submitApiKey: () => Promise<boolean>;
  submitDemoMode: () => Promise<boolean>;
  resetSetup: () => Promise<void>;
  reset: () => void;
}

const sequencer = new SetupSequencer({ config: configStore, auth: authService });

type SetupFields = Omit<
  SetupState,
  'setCredential' | 'toggleShowCredential' | 'submitApiKey' | 'submitDemoMode' | 'resetSetup' | 'reset'
>;

const initialState: SetupFields = {
  credential: '',
  showCredential: false,
  validationError: null,
  isDemoMode: false,
  isLoading: false,
  errorMessage: null,
  status: 'idle',
};

export const useSetupStore = create<SetupState>((set, get) => {
  // Resolves true when the caller should hand off to the main app
  const run = async (mode: SetupMode): Promise<boolean> => {
    // Prevent concurrent attempts
    if (get().isLoading) return false;

    const failurePrefix = mode.kind === 'demo' ? 'Demo setup failed' : 'Setup failed';

    set({
      isLoading: true,
      isDemoMode: mode.kind === 'demo',
      errorMessage: null,
      status: 'running',
    });

    try {
      const result = await sequencer.runSetup(mode);

      if (result === null) {
        set({ isLoading: false, status: sequencer.getStatus() });
        return false;
      }

      if (result.ok) {
        set({ isLoading: false, status: 'succeeded' });
        return true;
      }

      set({
        isLoading: false,
        status: 'failed',
        errorMessage: `${failurePrefix}: ${result.error.reason}`,
      });
      return false;
    } catch (error) {
      logError(error, { mode: mode.kind }, setupLogger);
      set({
        isLoading: false,
        status: 'failed',
        errorMessage: `${failurePrefix}: ${getUserMessage(error)}`,
      });
      return false;
    }
  };

  return {
    ...initialState,

    setCredential: (value: string) => {
      set({ credential: value, validationError: null });
    },

    toggleShowCredential: () => {
      set(state => ({ showCredential: !state.showCredential }));
    },

    submitApiKey: async () => {
      const validated = validateCredential(get().credential);
      if (!validated.ok) {
        set({ validationError: validated.error });
        return false;
      }

      set({ validationError: null });
      return run({ kind: 'apiKey', credential: validated.value });
    },

    submitDemoMode: async () => {
      set({ validationError: null });
      return run({ kind: 'demo' });
    },

    // Wipes stored configuration and signs out, back to first-run state
    resetSetup: async () => {
      await configStore.reset();
      authService.signOut();
      sequencer.reset();
      set({ ...initialState });
    },

    reset: () => {
      sequencer.reset();
      set({ ...initialState });
    },
  };
});
