/**
 * WordPress.com REST client
 *
 * Minimal GET client for the suggestion endpoints. Returns the raw body so
 * that decoding failures stay distinguishable from transport failures.
 */

import {
  createLogger,
  ERROR_NAMES,
  SuggestionErrorKind,
  WPCOM_API,
} from '@site-suggestions/common-types';
import { isSuggestionError, SuggestionError } from './suggestionErrors.js';
import type { ReachabilityReporter } from './ReachabilityMonitor.js';

const logger = createLogger('WpcomRestClient');

/** What the coordinator needs from an API client */
export interface SuggestionApiClient {
  /**
   * GET a path relative to the API host
   * @returns Response body text
   * @throws SuggestionError (TransportError; Timeout when aborted with a Timeout reason; otherwise Cancelled when the signal aborted)
   */
  get(path: string, options?: { signal?: AbortSignal }): Promise<string>;
}

export interface WpcomRestClientOptions {
  /** @default https://public-api.wordpress.com */
  baseUrl?: string;
  /** OAuth bearer token */
  token?: string;
  /** Receives the outcome of every request */
  reachability?: ReachabilityReporter;
}

export class WpcomRestClient implements SuggestionApiClient {
  private readonly baseUrl: string;
  private readonly token: string | undefined;
  private readonly reachability: ReachabilityReporter | undefined;

  constructor(options: WpcomRestClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? WPCOM_API.BASE_URL;
    this.token = options.token;
    this.reachability = options.reachability;
  }

  async get(path: string, options: { signal?: AbortSignal } = {}): Promise<string> {
    const url = new URL(path, this.baseUrl);
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.token !== undefined) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    let response: Response;
    try {
      response = await fetch(url, { method: 'GET', headers, signal: options.signal });
    } catch (error) {
      throw this.toRequestError(path, error, options.signal);
    }

    // Any response, even an error status, means the host is reachable
    this.reachability?.recordSuccess();

    if (!response.ok) {
      logger.warn(
        { path, status: response.status },
        '[WpcomRestClient] Request returned an error status'
      );
      throw new SuggestionError(
        SuggestionErrorKind.TransportError,
        `WordPress.com API returned ${response.status}: ${response.statusText}`,
        { status: response.status }
      );
    }

    try {
      return await response.text();
    } catch (error) {
      throw this.toRequestError(path, error, options.signal);
    }
  }

  private toRequestError(path: string, error: unknown, signal?: AbortSignal): SuggestionError {
    // Aborted by a timeout: the host did not answer in time, which counts against it
    const reason: unknown = signal?.reason;
    if (signal?.aborted === true && isSuggestionError(reason, SuggestionErrorKind.Timeout)) {
      this.reachability?.recordFailure();
      logger.warn({ path }, '[WpcomRestClient] Request timed out');
      return reason;
    }

    const isAbort =
      signal?.aborted === true || (error instanceof Error && error.name === ERROR_NAMES.ABORT_ERROR);
    if (isAbort) {
      logger.debug({ path }, '[WpcomRestClient] Request aborted');
      return new SuggestionError(SuggestionErrorKind.Cancelled, `Request to ${path} was aborted`, {
        cause: error,
      });
    }

    this.reachability?.recordFailure();
    logger.warn({ err: error, path }, '[WpcomRestClient] Request failed');
    return new SuggestionError(SuggestionErrorKind.TransportError, `Request to ${path} failed`, {
      cause: error,
    });
  }
}
