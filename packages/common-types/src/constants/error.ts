/**
 * Error Constants
 */

/**
 * Every way a suggestion lookup can fail. All kinds are terminal for the
 * request that produced them; nothing is retried automatically.
 */
export enum SuggestionErrorKind {
  /** No API client is configured for the site */
  MissingClient = 'missing_client',
  /** No suggestion store is configured */
  MissingPersistenceContext = 'missing_persistence_context',
  /** The site has no hostname to build the request path from */
  HostnameUnavailable = 'hostname_unavailable',
  /** Offline and nothing cached */
  NoResultsAvailable = 'no_results_available',
  /** Network failure or non-2xx response */
  TransportError = 'transport_error',
  /** Response body is not the expected JSON shape */
  DecodeError = 'decode_error',
  /** Store read or write failed */
  PersistenceError = 'persistence_error',
  /** Fetch did not finish within the configured timeout */
  Timeout = 'timeout',
  /** The caller aborted before a result was available */
  Cancelled = 'cancelled',
}

/**
 * Error names raised by the platform
 */
export const ERROR_NAMES = {
  /** DOMException thrown by AbortController */
  ABORT_ERROR: 'AbortError',
} as const;

/**
 * Maximum length of response bodies quoted in error messages
 */
export const MAX_ERROR_BODY_LENGTH = 200;
