import { describe, it, expect } from 'vitest';
import { SuggestionErrorKind, SuggestionType } from '@site-suggestions/common-types';
import { SUGGESTION_ENDPOINTS, decodeMentions, decodeXposts } from './suggestionEndpoints.js';
import { SuggestionError } from './suggestionErrors.js';

function decodeError(decode: () => unknown): SuggestionError {
  try {
    decode();
  } catch (error) {
    if (error instanceof SuggestionError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected decode to throw');
}

describe('decodeXposts', () => {
  it('should map wire fields onto site suggestions', () => {
    const body = JSON.stringify([
      {
        subdomain: 'teamblog',
        title: 'Team Blog',
        siteURL: 'https://teamblog.example.com',
        blavatar: 'https://example.com/blavatar.png',
      },
      { subdomain: 'notes', title: 'Notes', siteURL: 'https://notes.example.com' },
    ]);

    expect(decodeXposts(body)).toEqual([
      {
        type: SuggestionType.Xposts,
        key: 'teamblog',
        label: 'Team Blog',
        avatarUrl: 'https://example.com/blavatar.png',
        siteUrl: 'https://teamblog.example.com',
      },
      {
        type: SuggestionType.Xposts,
        key: 'notes',
        label: 'Notes',
        avatarUrl: null,
        siteUrl: 'https://notes.example.com',
      },
    ]);
  });

  it('should return frozen suggestions', () => {
    const [suggestion] = decodeXposts(
      JSON.stringify([{ subdomain: 'notes', title: 'Notes', siteURL: 'https://notes.example.com' }])
    );

    expect(Object.isFrozen(suggestion)).toBe(true);
  });

  it('should decode an empty list', () => {
    expect(decodeXposts('[]')).toEqual([]);
  });

  it('should reject a body that is not JSON', () => {
    const error = decodeError(() => decodeXposts('not-json'));

    expect(error.kind).toBe(SuggestionErrorKind.DecodeError);
    expect(error.message).toBe('Response is not valid JSON: not-json');
  });

  it('should reject entries missing required fields', () => {
    const error = decodeError(() => decodeXposts(JSON.stringify([{ title: 'Untitled' }])));

    expect(error.kind).toBe(SuggestionErrorKind.DecodeError);
    expect(error.message).toBe(
      'Response has an unexpected shape: 0.subdomain: Required; 0.siteURL: Required'
    );
  });

  it('should reject a non-array payload', () => {
    const error = decodeError(() => decodeXposts('{}'));

    expect(error.message).toBe(
      'Response has an unexpected shape: (root): Expected array, received object'
    );
  });
});

describe('decodeMentions', () => {
  it('should map wire fields onto user suggestions', () => {
    const body = JSON.stringify({
      suggestions: [
        { user_login: 'alice', display_name: 'Alice', image_URL: 'https://example.com/a.png' },
        { user_login: 'bob', display_name: 'Bob', image_URL: '' },
      ],
    });

    expect(decodeMentions(body)).toEqual([
      {
        type: SuggestionType.Mentions,
        key: 'alice',
        label: 'Alice',
        avatarUrl: 'https://example.com/a.png',
      },
      { type: SuggestionType.Mentions, key: 'bob', label: 'Bob', avatarUrl: null },
    ]);
  });

  it('should reject a payload without a suggestions list', () => {
    const error = decodeError(() => decodeMentions('[]'));

    expect(error.kind).toBe(SuggestionErrorKind.DecodeError);
  });
});

describe('SUGGESTION_ENDPOINTS', () => {
  it('should build the cross-post path from the hostname', () => {
    const path = SUGGESTION_ENDPOINTS[SuggestionType.Xposts].resolvePath({
      siteId: '42',
      hostname: 'example.wordpress.com',
    });

    expect(path).toBe('/wpcom/v2/sites/example.wordpress.com/xposts');
  });

  it('should have no cross-post path without a hostname', () => {
    const endpoint = SUGGESTION_ENDPOINTS[SuggestionType.Xposts];

    expect(endpoint.resolvePath({ siteId: '42', hostname: null })).toBeNull();
    expect(endpoint.resolvePath({ siteId: '42', hostname: '' })).toBeNull();
  });

  it('should build the mentions path from the site ID', () => {
    const path = SUGGESTION_ENDPOINTS[SuggestionType.Mentions].resolvePath({
      siteId: '42',
      hostname: null,
    });

    expect(path).toBe('/rest/v1.1/users/suggest?site_id=42');
  });
});
