/**
 * Wires suggestion services from validated configuration.
 */

import type { Redis } from 'ioredis';
import {
  createLogger,
  createRedisClient,
  resolveRedisConnection,
  SuggestionType,
  type EnvConfig,
  type SuggestionOf,
  type SuggestionSite,
} from '@site-suggestions/common-types';
import { ReachabilityMonitor } from './ReachabilityMonitor.js';
import { SuggestionService } from './SuggestionService.js';
import { WpcomRestClient, type SuggestionApiClient } from './WpcomRestClient.js';
import { MemorySuggestionStore } from './stores/MemorySuggestionStore.js';
import { RedisSuggestionStore } from './stores/RedisSuggestionStore.js';
import type { SuggestionStore } from './stores/SuggestionStore.js';

const logger = createLogger('createSuggestionServices');

export interface SuggestionServices {
  mentions: SuggestionService<SuggestionType.Mentions>;
  xposts: SuggestionService<SuggestionType.Xposts>;
  reachability: ReachabilityMonitor;
  /** Release connections opened by the factory */
  close(): Promise<void>;
}

export interface SuggestionServiceDeps {
  /** Existing Redis connection; one is opened from config when omitted */
  redis?: Redis;
  /**
   * Per-site API client lookup. Defaults to one shared WordPress.com client
   * for every site.
   */
  resolveClient?: (site: SuggestionSite) => SuggestionApiClient | null;
}

export function createSuggestionServices(
  config: EnvConfig,
  deps: SuggestionServiceDeps = {}
): SuggestionServices {
  const reachability = new ReachabilityMonitor({
    failureThreshold: config.REACHABILITY_FAILURE_THRESHOLD,
    recoveryTimeout: config.REACHABILITY_RECOVERY_MS,
  });

  const client = new WpcomRestClient({
    baseUrl: config.WPCOM_API_BASE_URL,
    token: config.WPCOM_API_TOKEN,
    reachability,
  });
  const resolveClient = deps.resolveClient ?? ((): SuggestionApiClient => client);

  let ownedRedis: Redis | undefined;
  let createStore: <K extends SuggestionType>(type: K) => SuggestionStore<SuggestionOf<K>>;

  if (config.SUGGESTION_STORE === 'redis') {
    const redis = deps.redis ?? createRedisClient(resolveRedisConnection(config));
    if (redis !== deps.redis) {
      ownedRedis = redis;
    }
    createStore = <K extends SuggestionType>(type: K) => new RedisSuggestionStore(redis, type);
  } else {
    createStore = <K extends SuggestionType>() =>
      new MemorySuggestionStore<SuggestionOf<K>>({ maxSites: config.SUGGESTION_CACHE_MAX_SITES });
  }

  logger.info(
    { store: config.SUGGESTION_STORE, baseUrl: config.WPCOM_API_BASE_URL },
    '[createSuggestionServices] Suggestion services ready'
  );

  return {
    mentions: new SuggestionService({
      type: SuggestionType.Mentions,
      store: createStore(SuggestionType.Mentions),
      connectivity: reachability,
      resolveClient,
      fetchTimeoutMs: config.SUGGESTION_FETCH_TIMEOUT_MS,
    }),
    xposts: new SuggestionService({
      type: SuggestionType.Xposts,
      store: createStore(SuggestionType.Xposts),
      connectivity: reachability,
      resolveClient,
      fetchTimeoutMs: config.SUGGESTION_FETCH_TIMEOUT_MS,
    }),
    reachability,
    close: async () => {
      if (ownedRedis !== undefined) {
        await ownedRedis.quit();
      }
    },
  };
}
