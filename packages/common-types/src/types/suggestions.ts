/**
 * Suggestion domain types
 *
 * Both variants expose the same `{ key, label, avatarUrl }` capability and are
 * told apart by their `type` tag, never by inspecting their shape.
 */

import type { SuggestionType } from '../constants/index.js';

/** Fields every suggestion exposes to the filter and the UI */
export interface SuggestionFields {
  /** Identifying key: username for mentions, subdomain for cross-posts */
  readonly key: string;
  /** Display label: display name for mentions, site title for cross-posts */
  readonly label: string;
  /** Avatar (gravatar or blavatar) URL */
  readonly avatarUrl: string | null;
}

export interface UserSuggestion extends SuggestionFields {
  readonly type: SuggestionType.Mentions;
}

export interface SiteSuggestion extends SuggestionFields {
  readonly type: SuggestionType.Xposts;
  readonly siteUrl: string;
}

export type Suggestion = UserSuggestion | SiteSuggestion;

/** The suggestion variant for a given type tag */
export type SuggestionOf<T extends SuggestionType> = Extract<Suggestion, { type: T }>;

/**
 * The parent entity suggestions are scoped to
 */
export interface SuggestionSite {
  /** Numeric WordPress.com site ID, as a string */
  siteId: string;
  /** Site hostname; cross-post lookups cannot run without it */
  hostname: string | null;
}
