/**
 * Mood configuration - the catalogue offered by the mood selector
 */

export interface MoodOption {
  label: string;
  emoji: string;
}

export const MOOD_OPTIONS: readonly MoodOption[] = [
  { label: 'Happy', emoji: '😊' },
  { label: 'Content', emoji: '😌' },
  { label: 'Energetic', emoji: '⚡' },
  { label: 'Grateful', emoji: '🙏' },
  { label: 'Confident', emoji: '💪' },
  { label: 'Peaceful', emoji: '🕊️' },
  { label: 'Excited', emoji: '🤩' },
  { label: 'Motivated', emoji: '🚀' },
  { label: 'Creative', emoji: '🎨' },
  { label: 'Social', emoji: '🤝' },
  { label: 'Reflective', emoji: '🤔' },
  { label: 'Unsure', emoji: '😕' },
  { label: 'Tired', emoji: '😴' },
  { label: 'Stressed', emoji: '😣' },
  { label: 'Sad', emoji: '😢' },
];

// Shown in the first row, the rest sit behind "More moods"
export const PRIMARY_MOODS = ['Happy', 'Content', 'Energetic', 'Grateful', 'Peaceful'];

