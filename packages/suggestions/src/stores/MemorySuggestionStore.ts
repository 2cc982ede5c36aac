/**
 * MemorySuggestionStore
 *
 * In-process store backed by lru-cache. Survives nothing beyond the process;
 * used when no Redis is configured and in tests. The least recently used
 * site is evicted once `maxSites` is reached.
 */

import { LRUCache } from 'lru-cache';
import { createLogger, MEMORY_STORE_DEFAULTS, type Suggestion } from '@site-suggestions/common-types';
import type { SuggestionStore } from './SuggestionStore.js';

const logger = createLogger('MemorySuggestionStore');

interface MemorySuggestionStoreOptions {
  /** Maximum number of sites to keep */
  maxSites?: number;
}

export class MemorySuggestionStore<T extends Suggestion> implements SuggestionStore<T> {
  private cache: LRUCache<string, readonly T[]>;

  constructor(options: MemorySuggestionStoreOptions = {}) {
    this.cache = new LRUCache<string, readonly T[]>({
      max: options.maxSites ?? MEMORY_STORE_DEFAULTS.MAX_SITES,
      dispose: (_value, siteId, reason) => {
        // Also called when replaceAll overwrites a site; only evictions are logged
        if (reason === 'evict') {
          logger.debug({ siteId }, '[MemorySuggestionStore] Evicted site');
        }
      },
    });
  }

  read(siteId: string): Promise<T[]> {
    return Promise.resolve([...(this.cache.get(siteId) ?? [])]);
  }

  replaceAll(siteId: string, items: readonly T[]): Promise<void> {
    // A single swap: readers see the old list or the new one, never a mix
    this.cache.set(siteId, Object.freeze([...items]));
    return Promise.resolve();
  }

  /** Number of sites currently held */
  size(): number {
    return this.cache.size;
  }
}
