export { SuggestionService, type SuggestionServiceOptions, type LookupOptions } from './SuggestionService.js';
export {
  SuggestionError,
  isSuggestionError,
  suggestionFailure,
  type SuggestionResult,
} from './suggestionErrors.js';
export {
  filterSuggestions,
  extractSuggestionQuery,
  formatSuggestionTitle,
  formatSuggestionSubtitle,
  formatSuggestionInsertText,
} from './SuggestionFilter.js';
export { lookupSuggestions } from './lookupSuggestions.js';
export {
  SUGGESTION_ENDPOINTS,
  decodeMentions,
  decodeXposts,
  type SuggestionEndpoint,
} from './suggestionEndpoints.js';
export {
  WpcomRestClient,
  type SuggestionApiClient,
  type WpcomRestClientOptions,
} from './WpcomRestClient.js';
export {
  ReachabilityMonitor,
  type Connectivity,
  type ReachabilityReporter,
  type ReachabilityState,
  type ReachabilityMonitorOptions,
} from './ReachabilityMonitor.js';
export type { SuggestionStore } from './stores/SuggestionStore.js';
export { MemorySuggestionStore } from './stores/MemorySuggestionStore.js';
export { RedisSuggestionStore } from './stores/RedisSuggestionStore.js';
export {
  createSuggestionServices,
  type SuggestionServices,
  type SuggestionServiceDeps,
} from './createSuggestionServices.js';
