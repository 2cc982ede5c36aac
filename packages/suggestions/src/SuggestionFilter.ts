/**
 * Suggestion filtering and trigger handling
 *
 * Pure helpers used while the user types: strip the trigger character from
 * the current word, then narrow the cached list to what matches.
 */

import {
  SUGGESTION_TRIGGERS,
  SuggestionType,
  type Suggestion,
  type SuggestionFields,
} from '@site-suggestions/common-types';

/**
 * Case-insensitive substring match against key or label.
 * Input order is preserved; an empty query matches everything.
 */
export function filterSuggestions<T extends SuggestionFields>(
  suggestions: readonly T[],
  query: string
): T[] {
  if (query.length === 0) {
    return [...suggestions];
  }

  const queryLower = query.toLowerCase();
  return suggestions.filter(
    s => s.key.toLowerCase().includes(queryLower) || s.label.toLowerCase().includes(queryLower)
  );
}

/**
 * The query typed after the trigger character, or null when the word does not
 * start with this type's trigger.
 *
 * @example
 * extractSuggestionQuery(SuggestionType.Mentions, '@ali') // 'ali'
 * extractSuggestionQuery(SuggestionType.Xposts, '@ali') // null
 */
export function extractSuggestionQuery(type: SuggestionType, word: string): string | null {
  const trigger = SUGGESTION_TRIGGERS[type];
  if (!word.startsWith(trigger)) {
    return null;
  }
  return word.slice(trigger.length);
}

/** Row title: trigger plus key, e.g. `@alice` or `+teamblog` */
export function formatSuggestionTitle(suggestion: Suggestion): string {
  return `${SUGGESTION_TRIGGERS[suggestion.type]}${suggestion.key}`;
}

/**
 * Text inserted into the editor when a row is picked: the username for a
 * mention, the site title for a cross-post
 */
export function formatSuggestionInsertText(suggestion: Suggestion): string {
  switch (suggestion.type) {
    case SuggestionType.Mentions:
      return suggestion.key;
    case SuggestionType.Xposts:
      return suggestion.label;
  }
}

/** Row subtitle: the display label */
export function formatSuggestionSubtitle(suggestion: Suggestion): string {
  return suggestion.label;
}
