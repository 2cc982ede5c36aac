import type { Suggestion } from '@site-suggestions/common-types';

/**
 * Persistence collaborator for one suggestion type.
 *
 * `replaceAll` is atomic: after it resolves the site holds exactly `items`;
 * after it rejects the site holds exactly what it held before.
 */
export interface SuggestionStore<T extends Suggestion = Suggestion> {
  /** Stored suggestions for a site, in stored order; empty when none */
  read(siteId: string): Promise<T[]>;
  replaceAll(siteId: string, items: readonly T[]): Promise<void>;
}
