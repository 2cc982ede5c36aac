/**
 * Constants Barrel Export
 *
 * Re-exports all domain-separated constants from a single entry point.
 */

// Timing constants
export { TIMEOUTS, REACHABILITY, REDIS_CONNECTION, RETRY_CONFIG } from './timing.js';

// Suggestion constants
export {
  SuggestionType,
  SUGGESTION_TRIGGERS,
  WPCOM_API,
  REDIS_KEY_PREFIXES,
  MEMORY_STORE_DEFAULTS,
  SERVICE_DEFAULTS,
} from './suggestions.js';

// Error constants
export { SuggestionErrorKind, ERROR_NAMES, MAX_ERROR_BODY_LENGTH } from './error.js';
