/**
 * Suggestion Schemas
 *
 * Zod schemas for the WordPress.com suggestion payloads and for suggestions
 * as they are written to a store.
 */

import { z } from 'zod';
import { SuggestionType } from '../../constants/index.js';

/**
 * One entry of `GET /wpcom/v2/sites/{hostname}/xposts`
 */
export const xpostWireSchema = z.object({
  subdomain: z.string().min(1),
  title: z.string(),
  siteURL: z.string(),
  blavatar: z.string().nullish(), // Absent or empty when the site has no icon
});

export const xpostsResponseSchema = z.array(xpostWireSchema);

/**
 * One entry of `GET /rest/v1.1/users/suggest`
 */
export const userSuggestionWireSchema = z.object({
  user_login: z.string().min(1),
  display_name: z.string(),
  image_URL: z.string().nullish(),
});

export const mentionsResponseSchema = z.object({
  suggestions: z.array(userSuggestionWireSchema),
});

/**
 * A suggestion as persisted by a store
 */
export const storedSuggestionSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal(SuggestionType.Mentions),
    key: z.string().min(1),
    label: z.string(),
    avatarUrl: z.string().nullable(),
  }),
  z.object({
    type: z.literal(SuggestionType.Xposts),
    key: z.string().min(1),
    label: z.string(),
    avatarUrl: z.string().nullable(),
    siteUrl: z.string(),
  }),
]);

export type XpostWire = z.infer<typeof xpostWireSchema>;
export type UserSuggestionWire = z.infer<typeof userSuggestionWireSchema>;
