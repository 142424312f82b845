import { create } from 'zustand';
import { createJSONStorage, persist } from 'zustand/middleware';
import type { AuthSession } from '@/types/api';

interface SessionState {
  session: AuthSession | null;
  setSession: (session: AuthSession) => void;
  clearSession: () => void;
}

// Anonymous session outlives a reload, like the configuration it was created with
export const useSessionStore = create<SessionState>()(
  persist(
    (set) => ({
      session: null,

      setSession: (session: AuthSession) => set({ session }),

      clearSession: () => set({ session: null }),
    }),
    {
      name: 'journal/auth_session',
      storage: createJSONStorage(() => window.localStorage),
      partialize: (state) => ({ session: state.session }),
    }
  )
);
