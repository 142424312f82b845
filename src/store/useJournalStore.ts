import { create } from 'zustand';
import type { JournalEntry } from '@/types/api';
import { api } from '@/lib/api';
import { APP_CONFIG } from '@/config/app';
import { getUserMessage } from '@/lib/errors';
import { journalLogger } from '@/lib/logger';
import { uniqueMoods, validateEntryText } from '@/lib/validation';

interface JournalState {
  // Draft
  selectedMoods: string[];
  text: string;

  // Save
  isSaving: boolean;
  saveError: string | null;

  // Actions
  setMoods: (newSelection: readonly string[]) => void;
  toggleMood: (mood: string) => void;
  setText: (value: string) => void;
  saveEntry: () => Promise<JournalEntry | null>;
  reset: () => void;
}

const createDraft = () => ({
  selectedMoods: [...APP_CONFIG.DEFAULT_MOODS],
  text: '',
});

export const useJournalStore = create<JournalState>((set, get) => ({
  ...createDraft(),
  isSaving: false,
  saveError: null,

  // Whole selection is swapped in one assignment
  setMoods: (newSelection: readonly string[]) => {
    set({ selectedMoods: uniqueMoods(newSelection) });
  },

  toggleMood: (mood: string) => {
    const { selectedMoods, setMoods } = get();
    setMoods(
      selectedMoods.includes(mood)
        ? selectedMoods.filter(m => m !== mood)
        : [...selectedMoods, mood]
    );
  },

  setText: (value: string) => {
    set({ text: value });
  },

  saveEntry: async () => {
    const { text, selectedMoods, isSaving } = get();

    // Prevent concurrent saves
    if (isSaving) return null;

    const validationError = validateEntryText(text);
    if (validationError) {
      set({ saveError: validationError });
      return null;
    }

    set({ isSaving: true, saveError: null });

    try {
      const entry = await api.entries.create({
        content: text.trim(),
        moods: selectedMoods,
      });
      journalLogger.info({ entryId: entry.id, moods: entry.moods.length }, 'Entry saved');
      set({ ...createDraft(), isSaving: false });
      return entry;
    } catch (error) {
      journalLogger.error({ err: error }, 'Failed to save entry');
      set({
        isSaving: false,
        saveError: getUserMessage(error, 'Could not save your entry'),
      });
      return null;
    }
  },

  reset: () => {
    set({ ...createDraft(), isSaving: false, saveError: null });
  },
}));
