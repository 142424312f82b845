/**
 * Application configuration constants
 * Centralized place for all magic numbers and configurable values
 */

export const APP_CONFIG = {
  /** Every Claude API key starts with this literal */
  CREDENTIAL_PREFIX: 'sk-ant-',

  /** Moods preselected on a fresh journal entry */
  DEFAULT_MOODS: ['Happy', 'Content'],

  /** Maximum characters accepted for journal entry text */
  MAX_ENTRY_CHARS: 10000,

  /** How much of a recovered draft to show in the recovery banner */
  DRAFT_PREVIEW_CHARS: 100,

  /** API request timeout in milliseconds */
  API_TIMEOUT_MS: 30000,

  /** Backend base path, proxied to the API server in development */
  API_BASE: import.meta.env.VITE_API_URL || '/api',
} as const;
