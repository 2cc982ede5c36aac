import type { SuggestionOf, SuggestionSite, SuggestionType } from '@site-suggestions/common-types';
import { extractSuggestionQuery, filterSuggestions } from './SuggestionFilter.js';
import type { LookupOptions, SuggestionService } from './SuggestionService.js';
import type { SuggestionResult } from './suggestionErrors.js';

/**
 * Suggestions matching the word under the cursor.
 *
 * Words that do not start with the service's trigger character match nothing
 * and cause no lookup.
 *
 * @example
 * await lookupSuggestions(xposts, site, '+team') // sites whose subdomain or title contains "team"
 */
export async function lookupSuggestions<K extends SuggestionType>(
  service: SuggestionService<K>,
  site: SuggestionSite,
  word: string,
  options: LookupOptions = {}
): Promise<SuggestionResult<SuggestionOf<K>>> {
  const query = extractSuggestionQuery(service.type, word);
  if (query === null) {
    return { ok: true, data: [] };
  }

  const result = await service.getSuggestions(site, options);
  if (!result.ok) {
    return result;
  }
  return { ok: true, data: filterSuggestions(result.data, query) };
}
