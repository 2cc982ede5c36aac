/**
 * Suggestion Error Types
 *
 * Every failure a lookup can produce is a SuggestionError tagged with a
 * SuggestionErrorKind. Lookups return them inside a SuggestionResult rather
 * than rejecting, so callers switch on `error.kind`.
 */

import { SuggestionErrorKind, type Suggestion } from '@site-suggestions/common-types';

interface SuggestionErrorOptions {
  siteId?: string;
  /** HTTP status, for transport errors that got a response */
  status?: number;
  cause?: unknown;
}

export class SuggestionError extends Error {
  readonly kind: SuggestionErrorKind;
  readonly siteId: string | undefined;
  readonly status: number | undefined;

  constructor(kind: SuggestionErrorKind, message: string, options: SuggestionErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'SuggestionError';
    this.kind = kind;
    this.siteId = options.siteId;
    this.status = options.status;
  }

  /**
   * Copy of this error attributed to a site. Lower layers (client, decoder,
   * store) raise errors without knowing which site asked.
   */
  forSite(siteId: string): SuggestionError {
    if (this.siteId === siteId) {
      return this;
    }
    return new SuggestionError(this.kind, this.message, {
      siteId,
      status: this.status,
      cause: this.cause,
    });
  }
}

export function isSuggestionError(
  error: unknown,
  kind?: SuggestionErrorKind
): error is SuggestionError {
  return error instanceof SuggestionError && (kind === undefined || error.kind === kind);
}

/**
 * Outcome of a suggestion lookup
 */
export type SuggestionResult<T extends Suggestion = Suggestion> =
  | { ok: true; data: T[] }
  | { ok: false; error: SuggestionError };

export function suggestionFailure(
  kind: SuggestionErrorKind,
  message: string,
  options: SuggestionErrorOptions = {}
): { ok: false; error: SuggestionError } {
  return { ok: false, error: new SuggestionError(kind, message, options) };
}
