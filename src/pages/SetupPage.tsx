import { useEffect, useState, type FormEvent } from 'react';
import { useNavigate } from 'react-router-dom';
import { Preloader } from 'konsta/react';
import { Brain, Bot, Eye, EyeOff, PlayCircle, X } from 'lucide-react';
import { useSetupStore } from '@/store/useSetupStore';
import { VALIDATION_MESSAGES } from '@/lib/validation';
import { API_KEY_HELP_STEPS } from '@/config/constants';

export default function SetupPage() {
  const navigate = useNavigate();
  const {
    credential,
    showCredential,
    validationError,
    isLoading,
    isDemoMode,
    errorMessage,
    setCredential,
    toggleShowCredential,
    submitApiKey,
    submitDemoMode,
    reset,
  } = useSetupStore();

  const [showHelp, setShowHelp] = useState(false);

  // Fresh state per visit
  useEffect(() => {
    reset();
  }, [reset]);

  const handleApiKeySetup = async () => {
    if (await submitApiKey()) {
      navigate('/', { replace: true });
    }
  };

  const handleDemoSetup = async () => {
    if (await submitDemoMode()) {
      navigate('/', { replace: true });
    }
  };

  const handleSubmit = (event: FormEvent) => {
    event.preventDefault();
    void handleApiKeySetup();
  };

  return (
    <div className="fade-in min-h-screen flex flex-col justify-center p-6">
      <form onSubmit={handleSubmit} noValidate className="space-y-6">

        {/* Header */}
        <div className="text-center">
          <div className="w-20 h-20 rounded-full bg-gradient-to-br from-orange-400 to-amber-500 flex items-center justify-center mx-auto mb-6">
            <Brain className="w-10 h-10 text-white" />
          </div>
          <h1 className="text-2xl font-extrabold text-orange-600">Welcome to Mood Journal</h1>
          <p className="text-gray-500 text-sm mt-2">Your AI-powered personal growth companion</p>
        </div>

        {/* API key card */}
        <div className="bg-white dark:bg-gray-800 rounded-3xl p-5 shadow-sm border border-gray-100 dark:border-gray-700">
          <div className="flex items-center gap-2 mb-2">
            <Bot className="w-5 h-5 text-orange-500" />
            <h2 className="font-bold text-gray-800 dark:text-white">Claude AI Configuration</h2>
          </div>
          <p className="text-sm text-gray-500 mb-4">
            Enter your Claude API key to enable AI-powered journal analysis and insights.
          </p>

          <label htmlFor="api-key" className="text-sm font-medium text-gray-600 dark:text-gray-300">
            Claude API Key
          </label>
          <div className="relative mt-1">
            <input
              id="api-key"
              type={showCredential ? 'text' : 'password'}
              value={credential}
              onChange={(e) => setCredential(e.target.value)}
              placeholder="sk-ant-..."
              autoComplete="off"
              disabled={isLoading}
              aria-invalid={validationError !== null}
              aria-describedby={validationError ? 'api-key-error' : undefined}
              className="w-full rounded-xl border border-gray-300 dark:border-gray-600 bg-transparent p-3 pr-12 text-[16px] focus:outline-none focus:border-orange-500"
            />
            <button
              type="button"
              onClick={toggleShowCredential}
              aria-label={showCredential ? 'Hide API key' : 'Show API key'}
              className="absolute right-3 top-1/2 -translate-y-1/2 text-gray-400"
            >
              {showCredential ? <EyeOff className="w-5 h-5" /> : <Eye className="w-5 h-5" />}
            </button>
          </div>
          {validationError && (
            <p id="api-key-error" role="alert" className="text-xs text-red-600 mt-2">
              {VALIDATION_MESSAGES[validationError]}
            </p>
          )}

          <button
            type="button"
            onClick={() => setShowHelp(true)}
            className="text-sm text-orange-600 underline mt-3"
          >
            Need help getting your API key? →
          </button>
        </div>

        {/* Demo mode card */}
        <div className="bg-white dark:bg-gray-800 rounded-3xl p-5 shadow-sm border border-gray-100 dark:border-gray-700">
          <div className="flex items-center gap-2 mb-2">
            <PlayCircle className="w-5 h-5 text-orange-500" />
            <h2 className="font-bold text-gray-800 dark:text-white">Demo Mode</h2>
          </div>
          <p className="text-sm text-gray-500">
            Try the app with limited features. You can add AI analysis later.
          </p>
        </div>

        {/* Actions */}
        <div className="space-y-3">
          <button
            type="button"
            onClick={() => void handleApiKeySetup()}
            disabled={isLoading}
            className="w-full py-4 rounded-2xl font-bold text-lg bg-gradient-to-r from-orange-500 to-amber-500 text-white shadow-xl flex items-center justify-center gap-2 disabled:opacity-60"
          >
            {isLoading && !isDemoMode ? <Preloader className="!w-5 !h-5" /> : 'Setup with AI Analysis'}
          </button>
          <button
            type="button"
            onClick={() => void handleDemoSetup()}
            disabled={isLoading}
            className="w-full py-4 rounded-2xl font-medium text-lg border border-gray-300 dark:border-gray-600 text-gray-700 dark:text-gray-200 flex items-center justify-center gap-2 disabled:opacity-60"
          >
            {isLoading && isDemoMode ? <Preloader className="!w-5 !h-5" /> : 'Continue in Demo Mode'}
          </button>
        </div>

        {errorMessage && (
          <div role="alert" className="rounded-xl border border-red-300 bg-red-50 p-3 text-center text-sm text-red-700">
            {errorMessage}
          </div>
        )}
      </form>

      {/* API key help */}
      {showHelp && (
        <div className="fixed inset-0 bg-black/40 backdrop-blur-sm flex items-center justify-center z-50">
          <div role="dialog" aria-labelledby="api-key-help-title" className="bg-white dark:bg-gray-800 rounded-3xl p-6 shadow-2xl mx-6 max-w-sm">
            <div className="flex items-start justify-between mb-3">
              <h3 id="api-key-help-title" className="font-bold text-lg text-gray-800 dark:text-white">
                Getting Your Claude API Key
              </h3>
              <button type="button" onClick={() => setShowHelp(false)} aria-label="Close">
                <X className="w-5 h-5 text-gray-400" />
              </button>
            </div>
            <ol className="list-decimal pl-5 space-y-1 text-sm text-gray-600 dark:text-gray-300">
              {API_KEY_HELP_STEPS.map((step) => (
                <li key={step}>{step}</li>
              ))}
            </ol>
            <p className="text-xs italic text-gray-500 mt-3">
              You'll need to add credits to your Anthropic account to use the API.
            </p>
            <button
              type="button"
              onClick={() => setShowHelp(false)}
              className="mt-5 w-full py-3 rounded-xl bg-orange-500 text-white font-semibold"
            >
              Got it
            </button>
          </div>
        </div>
      )}
    </div>
  );
}
