/**
 * Application constants - centralized hardcoded values
 */

// Placeholder texts for a new entry
export const PLACEHOLDER_TEXTS = [
  'Today I feel...',
  'Something that made me smile...',
  'What happened today...',
  'I keep thinking about...',
  'I want to remember...',
];

// Where users are sent to create an API key
export const API_KEY_HELP_STEPS = [
  'Visit console.anthropic.com',
  'Sign up or log in to your account',
  'Navigate to the API Keys section',
  'Create a new API key',
  'Copy the key (starts with "sk-ant-")',
];

// Random placeholder getter
export function getRandomPlaceholder(): string {
  return PLACEHOLDER_TEXTS[Math.floor(Math.random() * PLACEHOLDER_TEXTS.length)];
}
