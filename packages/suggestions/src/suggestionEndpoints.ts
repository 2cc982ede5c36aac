/**
 * Suggestion endpoints
 *
 * Per-type request path and payload decoder. The coordinator looks these up
 * by type tag, so adding a suggestion type means adding one entry here.
 */

import type { z } from 'zod';
import {
  MAX_ERROR_BODY_LENGTH,
  SuggestionErrorKind,
  SuggestionType,
  WPCOM_API,
  mentionsResponseSchema,
  xpostsResponseSchema,
  type SiteSuggestion,
  type SuggestionOf,
  type SuggestionSite,
  type UserSuggestion,
} from '@site-suggestions/common-types';
import { SuggestionError } from './suggestionErrors.js';

export interface SuggestionEndpoint<K extends SuggestionType> {
  /** Request path for the site, or null when the site lacks what the path needs */
  resolvePath: (site: SuggestionSite) => string | null;
  /** Decode a response body; throws a DecodeError SuggestionError */
  decode: (body: string) => SuggestionOf<K>[];
}

function parseBody<S extends z.ZodTypeAny>(body: string, schema: S): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new SuggestionError(
      SuggestionErrorKind.DecodeError,
      `Response is not valid JSON: ${body.substring(0, MAX_ERROR_BODY_LENGTH)}`,
      { cause: error }
    );
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 3)
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SuggestionError(
      SuggestionErrorKind.DecodeError,
      `Response has an unexpected shape: ${issues}`,
      { cause: result.error }
    );
  }
  return result.data;
}

function nonEmptyOrNull(value: string | null | undefined): string | null {
  return value !== undefined && value !== null && value !== '' ? value : null;
}

/**
 * Decode `GET /wpcom/v2/sites/{hostname}/xposts`
 */
export function decodeXposts(body: string): SiteSuggestion[] {
  return parseBody(body, xpostsResponseSchema).map(site => {
    const suggestion: SiteSuggestion = {
      type: SuggestionType.Xposts,
      key: site.subdomain,
      label: site.title,
      avatarUrl: nonEmptyOrNull(site.blavatar),
      siteUrl: site.siteURL,
    };
    return Object.freeze(suggestion);
  });
}

/**
 * Decode `GET /rest/v1.1/users/suggest`
 */
export function decodeMentions(body: string): UserSuggestion[] {
  return parseBody(body, mentionsResponseSchema).suggestions.map(user => {
    const suggestion: UserSuggestion = {
      type: SuggestionType.Mentions,
      key: user.user_login,
      label: user.display_name,
      avatarUrl: nonEmptyOrNull(user.image_URL),
    };
    return Object.freeze(suggestion);
  });
}

export const SUGGESTION_ENDPOINTS: { [K in SuggestionType]: SuggestionEndpoint<K> } = {
  [SuggestionType.Mentions]: {
    resolvePath: site => WPCOM_API.MENTIONS_PATH(site.siteId),
    decode: decodeMentions,
  },
  [SuggestionType.Xposts]: {
    resolvePath: site =>
      site.hostname !== null && site.hostname !== '' ? WPCOM_API.XPOSTS_PATH(site.hostname) : null,
    decode: decodeXposts,
  },
};
