import { useEffect, useRef, useState } from 'react';
import confetti from 'canvas-confetti';
import { useNavigate } from 'react-router-dom';
import { format } from 'date-fns';
import { Preloader } from 'konsta/react';
import { CheckCircle2, RotateCcw, Save } from 'lucide-react';
import MoodSelector from '@/components/MoodSelector';
import { useJournalStore } from '@/store/useJournalStore';
import { useSetupStore } from '@/store/useSetupStore';
import { configStore } from '@/services/configStore';
import { clearDraft, loadDraft, saveDraft, type JournalDraftSnapshot } from '@/services/draftStorage';
import { APP_CONFIG } from '@/config/app';
import { getRandomPlaceholder } from '@/config/constants';
import { getUserMessage, logError } from '@/lib/errors';
import { journalLogger } from '@/lib/logger';

export default function JournalPage() {
  const navigate = useNavigate();
  const {
    selectedMoods,
    text,
    isSaving,
    saveError,
    setMoods,
    toggleMood,
    setText,
    saveEntry,
  } = useJournalStore();
  const resetSetup = useSetupStore(state => state.resetSetup);

  const [placeholder] = useState(() => getRandomPlaceholder());
  const [recoverable, setRecoverable] = useState<JournalDraftSnapshot | null>(() => loadDraft());
  const [savedAt, setSavedAt] = useState<string | null>(null);
  const [resetError, setResetError] = useState<string | null>(null);
  const [{ demoMode, analysisEnabled }] = useState(() => configStore.getSnapshot());

  const textareaRef = useRef<HTMLTextAreaElement>(null);

  // Auto-focus textarea
  useEffect(() => {
    const timer = setTimeout(() => textareaRef.current?.focus(), 100);
    return () => clearTimeout(timer);
  }, []);

  // Keep a crash-recovery copy while a recovered draft is not pending
  useEffect(() => {
    if (!recoverable) {
      saveDraft(text, selectedMoods);
    }
  }, [text, selectedMoods, recoverable]);

  const handleRecover = () => {
    if (!recoverable) return;
    setText(recoverable.content);
    if (recoverable.moods.length > 0) {
      setMoods(recoverable.moods);
    }
    setRecoverable(null);
  };

  const handleDiscard = () => {
    clearDraft();
    setRecoverable(null);
  };

  const handleSave = async () => {
    const entry = await saveEntry();
    if (!entry) return;

    clearDraft();
    setSavedAt(entry.dateCreated);

    confetti({
      particleCount: 100,
      spread: 70,
      origin: { y: 0.6 },
      colors: ['#f97316', '#f59e0b', '#fb923c', '#fbbf24'],
    });
  };

  const handleResetSetup = async () => {
    setResetError(null);
    try {
      await resetSetup();
      navigate('/setup', { replace: true });
    } catch (error) {
      logError(error, { action: 'resetSetup' }, journalLogger);
      setResetError(getUserMessage(error, 'Could not reset setup'));
    }
  };

  const charCount = text.length;
  const isOverLimit = charCount > APP_CONFIG.MAX_ENTRY_CHARS;

  return (
    <div className="fade-in min-h-screen flex flex-col">
      <div className="p-4 space-y-4 pt-6 flex-1">

        {/* Header */}
        <div className="px-1 flex items-start justify-between">
          <div>
            <p className="text-gray-400 text-sm">{format(new Date(), 'EEEE, MMMM d')}</p>
            <h1 className="text-2xl font-extrabold text-gray-800 dark:text-white">How are you feeling?</h1>
            {demoMode && (
              <p className="text-xs text-orange-600 mt-1">
                Demo mode{analysisEnabled ? '' : ' · AI analysis off'}
              </p>
            )}
          </div>
          <button
            type="button"
            onClick={() => void handleResetSetup()}
            className="text-xs text-gray-400 flex items-center gap-1"
          >
            <RotateCcw className="w-4 h-4" />
            Reset setup
          </button>
        </div>

        {resetError && (
          <p role="alert" className="text-sm text-red-600 px-1">{resetError}</p>
        )}

        {/* Draft recovery */}
        {recoverable && (
          <div role="status" className="bg-amber-50 dark:bg-amber-900/30 rounded-3xl p-4 border border-amber-200 dark:border-amber-800">
            <h3 className="font-semibold text-sm text-amber-800 dark:text-amber-200 mb-1">Recover draft</h3>
            <p className="text-xs text-amber-700 dark:text-amber-300 mb-2">
              We found an unsaved draft from your previous session:
            </p>
            <p className="text-xs italic text-gray-600 dark:text-gray-300 mb-3">
              {recoverable.content.length > APP_CONFIG.DRAFT_PREVIEW_CHARS
                ? `${recoverable.content.substring(0, APP_CONFIG.DRAFT_PREVIEW_CHARS)}...`
                : recoverable.content}
            </p>
            <div className="flex gap-2">
              <button type="button" onClick={handleDiscard} className="px-3 py-1.5 rounded-xl text-sm text-gray-600">
                Discard
              </button>
              <button type="button" onClick={handleRecover} className="px-3 py-1.5 rounded-xl text-sm bg-orange-500 text-white">
                Recover
              </button>
            </div>
          </div>
        )}

        {/* Mood Selector Card */}
        <div className="bg-white dark:bg-gray-800 rounded-3xl p-5 shadow-sm border border-gray-100 dark:border-gray-700">
          <p className="text-sm font-medium text-gray-600 dark:text-gray-300 mb-3">Pick your moods</p>
          <MoodSelector selected={selectedMoods} onToggle={toggleMood} disabled={isSaving} />
        </div>

        {/* Textarea Card */}
        <div className="bg-white dark:bg-gray-800 rounded-3xl shadow-sm border border-gray-100 dark:border-gray-700 overflow-hidden flex-1">
          <div className="relative">
            <textarea
              ref={textareaRef}
              aria-label="Journal entry"
              value={text}
              onChange={(e) => {
                setSavedAt(null);
                setText(e.target.value);
              }}
              placeholder={placeholder}
              disabled={isSaving}
              className="w-full min-h-[200px] p-5 bg-transparent
                         text-gray-900 dark:text-white placeholder:text-gray-400 resize-none
                         focus:outline-none text-[16px] leading-relaxed"
            />

            <div className={`absolute bottom-4 right-4 text-xs font-semibold px-3 py-1.5 rounded-full ${isOverLimit
                ? 'bg-red-100 dark:bg-red-900/50 text-red-600 dark:text-red-400'
                : 'bg-gray-100 dark:bg-gray-700 text-gray-500'
              }`}>
              {charCount} / {APP_CONFIG.MAX_ENTRY_CHARS}
            </div>
          </div>
        </div>

        {saveError && (
          <p role="alert" className="text-sm text-red-600 px-1">{saveError}</p>
        )}

        {savedAt && (
          <p role="status" className="text-sm text-green-600 px-1 flex items-center gap-1">
            <CheckCircle2 className="w-4 h-4" />
            Saved at {format(new Date(savedAt), 'HH:mm')}
          </p>
        )}

        {/* Submit Button */}
        <button
          type="button"
          onClick={() => void handleSave()}
          disabled={isSaving || isOverLimit}
          className="w-full py-4 rounded-2xl font-bold text-lg bg-gradient-to-r from-orange-500 to-amber-500 text-white
                     shadow-xl active:scale-[0.98] transition-all flex items-center justify-center gap-2
                     disabled:opacity-60 disabled:active:scale-100"
        >
          {isSaving ? (
            <>
              <Preloader className="!w-5 !h-5" />
              <span>Saving...</span>
            </>
          ) : (
            <>
              <Save className="w-5 h-5" />
              <span>Save entry</span>
            </>
          )}
        </button>
      </div>
    </div>
  );
}
