import { useState } from 'react';
import { ChevronDown, ChevronUp } from 'lucide-react';
import { MOOD_OPTIONS, PRIMARY_MOODS } from '@/config/moods';

interface MoodSelectorProps {
  selected: readonly string[];
  onToggle: (mood: string) => void;
  disabled?: boolean;
}

export default function MoodSelector({ selected, onToggle, disabled }: MoodSelectorProps) {
  const [showAll, setShowAll] = useState(false);

  const visibleMoods = showAll
    ? MOOD_OPTIONS
    : MOOD_OPTIONS.filter(mood => PRIMARY_MOODS.includes(mood.label));

  return (
    <div>
      <div className="flex flex-wrap gap-2">
        {visibleMoods.map((mood) => {
          const isSelected = selected.includes(mood.label);
          return (
            <button
              key={mood.label}
              type="button"
              aria-pressed={isSelected}
              disabled={disabled}
              onClick={() => onToggle(mood.label)}
              className={`
                px-3 py-2 rounded-2xl flex items-center gap-1.5 text-sm font-medium
                transition-all duration-200 active:scale-95
                ${isSelected
                  ? 'bg-gradient-to-br from-orange-400 to-amber-500 text-white shadow-lg shadow-orange-500/30'
                  : 'bg-gray-100 dark:bg-gray-700 text-gray-700 dark:text-gray-200 hover:bg-gray-200'
                }
              `}
            >
              <span>{mood.emoji}</span>
              <span>{mood.label}</span>
            </button>
          );
        })}
      </div>

      <button
        type="button"
        onClick={() => setShowAll(value => !value)}
        className="mt-3 text-xs font-semibold text-orange-600 flex items-center gap-1"
      >
        {showAll ? <ChevronUp className="w-4 h-4" /> : <ChevronDown className="w-4 h-4" />}
        {showAll ? 'Fewer moods' : 'More moods'}
      </button>
    </div>
  );
}
