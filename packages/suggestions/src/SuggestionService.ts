/**
 * SuggestionService
 *
 * Serves autocomplete suggestions of one type for a site: stored results
 * first, the network when nothing is stored, and never more than one request
 * per site at a time.
 *
 * Lookup order:
 * 1. Stored suggestions for the site, when non-empty
 * 2. NoResultsAvailable when the API is unreachable
 * 3. Join the site's in-flight request, if there is one
 * 4. Otherwise request, decode, replace the stored set, and answer every
 *    waiter with the freshly stored list
 *
 * In-flight requests are keyed by site, so lookups for different sites run
 * independently while duplicate lookups for one site share a single request.
 * A failed request leaves the stored set untouched.
 */

import {
  createLogger,
  SuggestionErrorKind,
  TIMEOUTS,
  type Suggestion,
  type SuggestionOf,
  type SuggestionSite,
  type SuggestionType,
} from '@site-suggestions/common-types';
import { SUGGESTION_ENDPOINTS, type SuggestionEndpoint } from './suggestionEndpoints.js';
import {
  isSuggestionError,
  suggestionFailure,
  SuggestionError,
  type SuggestionResult,
} from './suggestionErrors.js';
import type { SuggestionApiClient } from './WpcomRestClient.js';
import type { Connectivity } from './ReachabilityMonitor.js';
import type { SuggestionStore } from './stores/SuggestionStore.js';

const logger = createLogger('SuggestionService');

export interface SuggestionServiceOptions<K extends SuggestionType> {
  type: K;
  /** Null when no persistence is configured; every lookup then fails */
  store: SuggestionStore<SuggestionOf<K>> | null;
  connectivity: Connectivity;
  /** API client for a site, or null when the site has none */
  resolveClient: (site: SuggestionSite) => SuggestionApiClient | null;
  /**
   * Time allowed for request and decode (milliseconds); a started store write is not cut short
   * @default 15000
   */
  fetchTimeoutMs?: number;
}

export interface LookupOptions {
  /** Aborting resolves this caller with Cancelled */
  signal?: AbortSignal;
}

interface Waiter<T extends Suggestion> {
  resolve: (result: SuggestionResult<T>) => void;
}

interface PendingFetch<T extends Suggestion> {
  waiters: Set<Waiter<T>>;
  controller: AbortController;
  timer: ReturnType<typeof setTimeout> | undefined;
  /** Set once the store write starts; from then on the write decides the outcome */
  writing: boolean;
  settled: boolean;
}

export class SuggestionService<K extends SuggestionType> {
  readonly type: K;
  private readonly store: SuggestionStore<SuggestionOf<K>> | null;
  private readonly connectivity: Connectivity;
  private readonly resolveClient: (site: SuggestionSite) => SuggestionApiClient | null;
  private readonly fetchTimeoutMs: number;
  private readonly endpoint: SuggestionEndpoint<K>;
  private readonly inFlight = new Map<string, PendingFetch<SuggestionOf<K>>>();

  constructor(options: SuggestionServiceOptions<K>) {
    this.type = options.type;
    this.store = options.store;
    this.connectivity = options.connectivity;
    this.resolveClient = options.resolveClient;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? TIMEOUTS.SUGGESTION_FETCH;
    this.endpoint = SUGGESTION_ENDPOINTS[options.type];
  }

  /**
   * Suggestions for a site, from the store when possible.
   * Never rejects; failures come back as `{ ok: false, error }`.
   */
  async getSuggestions(
    site: SuggestionSite,
    options: LookupOptions = {}
  ): Promise<SuggestionResult<SuggestionOf<K>>> {
    const { siteId } = site;
    if (options.signal?.aborted === true) {
      return this.cancelled(siteId);
    }

    const store = this.store;
    if (store === null) {
      return this.missingStore(siteId);
    }

    let stored: SuggestionOf<K>[];
    try {
      stored = await store.read(siteId);
    } catch (error) {
      return { ok: false, error: this.toError(error, SuggestionErrorKind.PersistenceError, siteId) };
    }

    if (stored.length > 0) {
      logger.debug(
        { siteId, type: this.type, count: stored.length },
        '[SuggestionService] Cache HIT'
      );
      return { ok: true, data: stored };
    }

    logger.debug({ siteId, type: this.type }, '[SuggestionService] Cache MISS');
    return this.fetchIfNeeded(site, store, options.signal);
  }

  /**
   * Reload from the network even when suggestions are stored, e.g. after
   * connectivity comes back. Joins an in-flight request for the site if any.
   */
  async refresh(
    site: SuggestionSite,
    options: LookupOptions = {}
  ): Promise<SuggestionResult<SuggestionOf<K>>> {
    if (options.signal?.aborted === true) {
      return this.cancelled(site.siteId);
    }
    if (this.store === null) {
      return this.missingStore(site.siteId);
    }
    return this.fetchIfNeeded(site, this.store, options.signal);
  }

  /** Whether a request for the site is outstanding */
  isFetching(siteId: string): boolean {
    return this.inFlight.has(siteId);
  }

  private fetchIfNeeded(
    site: SuggestionSite,
    store: SuggestionStore<SuggestionOf<K>>,
    signal: AbortSignal | undefined
  ): Promise<SuggestionResult<SuggestionOf<K>>> {
    const { siteId } = site;

    if (!this.connectivity.isReachable()) {
      logger.info({ siteId, type: this.type }, '[SuggestionService] Offline with nothing cached');
      return Promise.resolve(
        suggestionFailure(
          SuggestionErrorKind.NoResultsAvailable,
          'The API is unreachable and there are no cached suggestions',
          { siteId }
        )
      );
    }

    let pending = this.inFlight.get(siteId);
    if (pending !== undefined) {
      logger.debug({ siteId, type: this.type }, '[SuggestionService] Joining in-flight request');
    } else {
      const started = this.startFetch(site, store);
      if (started instanceof SuggestionError) {
        return Promise.resolve({ ok: false, error: started });
      }
      pending = started;
    }

    return this.join(siteId, pending, signal);
  }

  private startFetch(
    site: SuggestionSite,
    store: SuggestionStore<SuggestionOf<K>>
  ): PendingFetch<SuggestionOf<K>> | SuggestionError {
    const { siteId } = site;

    const client = this.resolveClient(site);
    if (client === null) {
      return new SuggestionError(
        SuggestionErrorKind.MissingClient,
        `No API client configured for site ${siteId}`,
        { siteId }
      );
    }

    const path = this.endpoint.resolvePath(site);
    if (path === null) {
      return new SuggestionError(
        SuggestionErrorKind.HostnameUnavailable,
        `Site ${siteId} has no hostname`,
        { siteId }
      );
    }

    const pending: PendingFetch<SuggestionOf<K>> = {
      waiters: new Set(),
      controller: new AbortController(),
      timer: undefined,
      writing: false,
      settled: false,
    };
    this.inFlight.set(siteId, pending);

    pending.timer = setTimeout(() => {
      if (pending.writing) {
        return;
      }
      logger.warn(
        { siteId, type: this.type, timeoutMs: this.fetchTimeoutMs },
        '[SuggestionService] Request timed out'
      );
      // The client reports a Timeout abort reason as a network failure
      const error = new SuggestionError(
        SuggestionErrorKind.Timeout,
        `Suggestion request timed out after ${this.fetchTimeoutMs}ms`,
        { siteId }
      );
      pending.controller.abort(error);
      this.settle(siteId, pending, { ok: false, error });
    }, this.fetchTimeoutMs);

    logger.info({ siteId, type: this.type, path }, '[SuggestionService] Fetching suggestions');

    this.runFetch(siteId, client, path, store, pending).then(
      result => this.settle(siteId, pending, result),
      (error: unknown) =>
        this.settle(siteId, pending, {
          ok: false,
          error: this.toError(error, SuggestionErrorKind.TransportError, siteId),
        })
    );

    return pending;
  }

  /**
   * Request, decode and store. Resolves with the outcome; never rejects.
   * The timeout covers request and decode only: once the write starts it runs
   * to completion and its outcome is what waiters receive.
   */
  private async runFetch(
    siteId: string,
    client: SuggestionApiClient,
    path: string,
    store: SuggestionStore<SuggestionOf<K>>,
    pending: PendingFetch<SuggestionOf<K>>
  ): Promise<SuggestionResult<SuggestionOf<K>>> {
    const { signal } = pending.controller;
    let body: string;
    try {
      body = await client.get(path, { signal });
    } catch (error) {
      return { ok: false, error: this.toError(error, SuggestionErrorKind.TransportError, siteId) };
    }

    let suggestions: SuggestionOf<K>[];
    try {
      suggestions = this.endpoint.decode(body);
    } catch (error) {
      logger.warn({ err: error, siteId, type: this.type }, '[SuggestionService] Decode failed');
      return { ok: false, error: this.toError(error, SuggestionErrorKind.DecodeError, siteId) };
    }

    // Timed out or abandoned while the response was in transit: leave the store alone
    if (signal.aborted) {
      return this.cancelled(siteId);
    }

    pending.writing = true;
    clearTimeout(pending.timer);

    try {
      await store.replaceAll(siteId, suggestions);
      const persisted = await store.read(siteId);
      logger.info(
        { siteId, type: this.type, count: persisted.length },
        '[SuggestionService] Stored fresh suggestions'
      );
      return { ok: true, data: persisted };
    } catch (error) {
      return { ok: false, error: this.toError(error, SuggestionErrorKind.PersistenceError, siteId) };
    }
  }

  private join(
    siteId: string,
    pending: PendingFetch<SuggestionOf<K>>,
    signal: AbortSignal | undefined
  ): Promise<SuggestionResult<SuggestionOf<K>>> {
    return new Promise(resolve => {
      const onAbort = (): void => {
        pending.waiters.delete(waiter);
        resolve(this.cancelled(siteId));

        // A write in progress is never abandoned; it settles on its own
        if (pending.waiters.size === 0 && !pending.writing) {
          logger.debug({ siteId, type: this.type }, '[SuggestionService] All callers gone, aborting');
          pending.controller.abort();
          this.settle(siteId, pending, this.cancelled(siteId));
        }
      };

      const waiter: Waiter<SuggestionOf<K>> = {
        resolve: result => {
          signal?.removeEventListener('abort', onAbort);
          resolve(result);
        },
      };

      pending.waiters.add(waiter);
      if (signal?.aborted === true) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Clear the in-flight record, then answer every waiter. Only the first
   * outcome (response, timeout or abandonment) counts.
   */
  private settle(
    siteId: string,
    pending: PendingFetch<SuggestionOf<K>>,
    result: SuggestionResult<SuggestionOf<K>>
  ): void {
    if (pending.settled) {
      return;
    }
    pending.settled = true;
    clearTimeout(pending.timer);

    if (this.inFlight.get(siteId) === pending) {
      this.inFlight.delete(siteId);
    }

    if (!result.ok && result.error.kind !== SuggestionErrorKind.Cancelled) {
      logger.warn(
        { err: result.error, siteId, type: this.type, waiters: pending.waiters.size },
        '[SuggestionService] Suggestion request failed'
      );
    }

    for (const waiter of pending.waiters) {
      waiter.resolve(result);
    }
    pending.waiters.clear();
  }

  private toError(error: unknown, fallbackKind: SuggestionErrorKind, siteId: string): SuggestionError {
    if (isSuggestionError(error)) {
      return error.forSite(siteId);
    }
    return new SuggestionError(fallbackKind, error instanceof Error ? error.message : String(error), {
      siteId,
      cause: error,
    });
  }

  private cancelled(siteId: string): { ok: false; error: SuggestionError } {
    return suggestionFailure(SuggestionErrorKind.Cancelled, 'Suggestion lookup was cancelled', {
      siteId,
    });
  }

  private missingStore(siteId: string): Promise<{ ok: false; error: SuggestionError }> {
    return Promise.resolve(
      suggestionFailure(
        SuggestionErrorKind.MissingPersistenceContext,
        'No suggestion store is configured',
        { siteId }
      )
    );
  }
}
