/**
 * RedisSuggestionStore
 *
 * Persists each site's suggestions as a Redis list of JSON entries under
 * `suggestions:{type}:{siteId}`. Replacement runs DEL and RPUSH inside one
 * MULTI/EXEC transaction, so no reader sees the list empty or half-written.
 */

import type { Redis } from 'ioredis';
import {
  createLogger,
  REDIS_KEY_PREFIXES,
  storedSuggestionSchema,
  SuggestionErrorKind,
  type Suggestion,
  type SuggestionOf,
  type SuggestionType,
} from '@site-suggestions/common-types';
import { SuggestionError } from '../suggestionErrors.js';
import type { SuggestionStore } from './SuggestionStore.js';

const logger = createLogger('RedisSuggestionStore');

function isOfType<K extends SuggestionType>(
  suggestion: Suggestion,
  type: K
): suggestion is SuggestionOf<K> {
  return suggestion.type === type;
}

export class RedisSuggestionStore<K extends SuggestionType>
  implements SuggestionStore<SuggestionOf<K>>
{
  constructor(
    private redis: Redis,
    private readonly type: K
  ) {}

  async read(siteId: string): Promise<SuggestionOf<K>[]> {
    const key = this.getKey(siteId);

    let entries: string[];
    try {
      entries = await this.redis.lrange(key, 0, -1);
    } catch (error) {
      logger.error({ err: error, siteId }, '[RedisSuggestionStore] Failed to read suggestions');
      throw new SuggestionError(
        SuggestionErrorKind.PersistenceError,
        `Failed to read suggestions for site ${siteId}`,
        { siteId, cause: error }
      );
    }

    return entries.map(entry => this.parseEntry(siteId, entry));
  }

  async replaceAll(siteId: string, items: readonly SuggestionOf<K>[]): Promise<void> {
    const key = this.getKey(siteId);
    const transaction = this.redis.multi().del(key);
    if (items.length > 0) {
      transaction.rpush(key, ...items.map(item => JSON.stringify(item)));
    }

    let results: [error: Error | null, result: unknown][] | null;
    try {
      results = await transaction.exec();
    } catch (error) {
      throw this.toWriteError(siteId, error);
    }

    if (results === null) {
      throw this.toWriteError(siteId, new Error('Transaction was discarded'));
    }
    const failed = results.find(([error]) => error !== null);
    if (failed !== undefined) {
      throw this.toWriteError(siteId, failed[0]);
    }

    logger.debug(
      { siteId, type: this.type, count: items.length },
      '[RedisSuggestionStore] Replaced suggestions'
    );
  }

  private parseEntry(siteId: string, entry: string): SuggestionOf<K> {
    let json: unknown;
    try {
      json = JSON.parse(entry);
    } catch (error) {
      throw this.toCorruptEntryError(siteId, error);
    }

    const result = storedSuggestionSchema.safeParse(json);
    if (!result.success) {
      throw this.toCorruptEntryError(siteId, result.error);
    }
    const entryType: string = result.data.type;
    if (isOfType(result.data, this.type)) {
      return result.data;
    }
    throw this.toCorruptEntryError(
      siteId,
      new Error(`Entry of type ${entryType} in ${this.type} list`)
    );
  }

  private toCorruptEntryError(siteId: string, cause: unknown): SuggestionError {
    logger.error({ err: cause, siteId }, '[RedisSuggestionStore] Corrupt cache entry');
    return new SuggestionError(
      SuggestionErrorKind.PersistenceError,
      `Stored suggestions for site ${siteId} are corrupt`,
      { siteId, cause }
    );
  }

  private toWriteError(siteId: string, cause: unknown): SuggestionError {
    logger.error({ err: cause, siteId }, '[RedisSuggestionStore] Failed to replace suggestions');
    return new SuggestionError(
      SuggestionErrorKind.PersistenceError,
      `Failed to replace suggestions for site ${siteId}`,
      { siteId, cause }
    );
  }

  private getKey(siteId: string): string {
    return `${REDIS_KEY_PREFIXES.SUGGESTIONS}${this.type}:${siteId}`;
  }
}
