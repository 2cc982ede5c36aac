/**
 * Suggestion Constants
 */

/**
 * Kinds of autocomplete suggestion. Each kind is its own resource class with
 * its own endpoint, cache namespace and trigger character.
 */
export enum SuggestionType {
  /** `@username` mentions of users on the site */
  Mentions = 'mentions',
  /** `+subdomain` cross-posts to other sites */
  Xposts = 'xposts',
}

/**
 * Character typed before a query to open the suggestion list
 */
export const SUGGESTION_TRIGGERS: Readonly<Record<SuggestionType, string>> = {
  [SuggestionType.Mentions]: '@',
  [SuggestionType.Xposts]: '+',
};

/**
 * WordPress.com REST API settings
 */
export const WPCOM_API = {
  /** Public API host */
  BASE_URL: 'https://public-api.wordpress.com',
  /** Cross-post targets for a site, by hostname */
  XPOSTS_PATH: (hostname: string) => `/wpcom/v2/sites/${encodeURIComponent(hostname)}/xposts`,
  /** User mention suggestions for a site, by numeric site ID */
  MENTIONS_PATH: (siteId: string) => `/rest/v1.1/users/suggest?site_id=${encodeURIComponent(siteId)}`,
} as const;

/**
 * Redis key prefixes
 */
export const REDIS_KEY_PREFIXES = {
  /** Suggestion lists, followed by `{type}:{siteId}` */
  SUGGESTIONS: 'suggestions:',
} as const;

/**
 * Defaults for the in-process suggestion store
 */
export const MEMORY_STORE_DEFAULTS = {
  /** Sites kept before least-recently-used eviction */
  MAX_SITES: 500,
} as const;

export const SERVICE_DEFAULTS = {
  /** Default Redis port */
  REDIS_PORT: 6379,
} as const;
