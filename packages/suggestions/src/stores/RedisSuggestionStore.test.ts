/**
 * Tests for RedisSuggestionStore
 *
 * Redis is replaced by a mock exposing the commands the store uses.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Redis } from 'ioredis';
import {
  SuggestionErrorKind,
  SuggestionType,
  type SiteSuggestion,
} from '@site-suggestions/common-types';
import { RedisSuggestionStore } from './RedisSuggestionStore.js';
import { SuggestionError } from '../suggestionErrors.js';

vi.mock('@site-suggestions/common-types', async importOriginal => {
  const actual = await importOriginal<typeof import('@site-suggestions/common-types')>();
  return {
    ...actual,
    createLogger: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  };
});

function xpost(subdomain: string): SiteSuggestion {
  return {
    type: SuggestionType.Xposts,
    key: subdomain,
    label: `${subdomain} title`,
    avatarUrl: null,
    siteUrl: `https://${subdomain}.example.com`,
  };
}

describe('RedisSuggestionStore', () => {
  let transaction: {
    del: ReturnType<typeof vi.fn>;
    rpush: ReturnType<typeof vi.fn>;
    exec: ReturnType<typeof vi.fn>;
  };
  let mockRedis: { lrange: ReturnType<typeof vi.fn>; multi: ReturnType<typeof vi.fn> };
  let store: RedisSuggestionStore<SuggestionType.Xposts>;

  async function getError(promise: Promise<unknown>): Promise<SuggestionError> {
    const error: unknown = await promise.then(
      () => undefined,
      (e: unknown) => e
    );
    if (!(error instanceof SuggestionError)) {
      throw new Error('Expected a SuggestionError');
    }
    return error;
  }

  beforeEach(() => {
    transaction = {
      del: vi.fn().mockReturnThis(),
      rpush: vi.fn().mockReturnThis(),
      exec: vi.fn().mockResolvedValue([
        [null, 1],
        [null, 2],
      ]),
    };
    mockRedis = {
      lrange: vi.fn().mockResolvedValue([]),
      multi: vi.fn().mockReturnValue(transaction),
    };
    store = new RedisSuggestionStore(mockRedis as unknown as Redis, SuggestionType.Xposts);
  });

  describe('read', () => {
    it('should read the whole list for the site key', async () => {
      mockRedis.lrange.mockResolvedValue([JSON.stringify(xpost('alpha'))]);

      const result = await store.read('42');

      expect(mockRedis.lrange).toHaveBeenCalledWith('suggestions:xposts:42', 0, -1);
      expect(result).toEqual([xpost('alpha')]);
    });

    it('should return an empty list when nothing is stored', async () => {
      expect(await store.read('42')).toEqual([]);
    });

    it('should reject entries that are not JSON', async () => {
      mockRedis.lrange.mockResolvedValue(['{broken']);

      const error = await getError(store.read('42'));

      expect(error.kind).toBe(SuggestionErrorKind.PersistenceError);
      expect(error.message).toBe('Stored suggestions for site 42 are corrupt');
      expect(error.siteId).toBe('42');
    });

    it('should reject entries of another suggestion type', async () => {
      mockRedis.lrange.mockResolvedValue([
        JSON.stringify({ type: 'mentions', key: 'alice', label: 'Alice', avatarUrl: null }),
      ]);

      const error = await getError(store.read('42'));

      expect(error.kind).toBe(SuggestionErrorKind.PersistenceError);
      expect(error.cause).toEqual(new Error('Entry of type mentions in xposts list'));
    });

    it('should wrap connection errors', async () => {
      const cause = new Error('Connection is closed.');
      mockRedis.lrange.mockRejectedValue(cause);

      const error = await getError(store.read('42'));

      expect(error.kind).toBe(SuggestionErrorKind.PersistenceError);
      expect(error.message).toBe('Failed to read suggestions for site 42');
      expect(error.cause).toBe(cause);
    });
  });

  describe('replaceAll', () => {
    it('should delete then push inside one transaction', async () => {
      await store.replaceAll('42', [xpost('gamma'), xpost('delta')]);

      expect(mockRedis.multi).toHaveBeenCalledTimes(1);
      expect(transaction.del).toHaveBeenCalledWith('suggestions:xposts:42');
      expect(transaction.rpush).toHaveBeenCalledWith(
        'suggestions:xposts:42',
        JSON.stringify(xpost('gamma')),
        JSON.stringify(xpost('delta'))
      );
      expect(transaction.del.mock.invocationCallOrder[0]).toBeLessThan(
        transaction.rpush.mock.invocationCallOrder[0]
      );
      expect(transaction.exec).toHaveBeenCalledTimes(1);
    });

    it('should only delete when replacing with an empty list', async () => {
      transaction.exec.mockResolvedValue([[null, 1]]);

      await store.replaceAll('42', []);

      expect(transaction.del).toHaveBeenCalledWith('suggestions:xposts:42');
      expect(transaction.rpush).not.toHaveBeenCalled();
    });

    it('should fail when the transaction throws', async () => {
      transaction.exec.mockRejectedValue(new Error('EXECABORT'));

      const error = await getError(store.replaceAll('42', [xpost('gamma')]));

      expect(error.kind).toBe(SuggestionErrorKind.PersistenceError);
      expect(error.message).toBe('Failed to replace suggestions for site 42');
    });

    it('should fail when the transaction is discarded', async () => {
      transaction.exec.mockResolvedValue(null);

      const error = await getError(store.replaceAll('42', [xpost('gamma')]));

      expect(error.cause).toEqual(new Error('Transaction was discarded'));
    });

    it('should fail when a command inside the transaction fails', async () => {
      const commandError = new Error('WRONGTYPE Operation against a key holding the wrong kind of value');
      transaction.exec.mockResolvedValue([
        [null, 1],
        [commandError, null],
      ]);

      const error = await getError(store.replaceAll('42', [xpost('gamma')]));

      expect(error.kind).toBe(SuggestionErrorKind.PersistenceError);
      expect(error.cause).toBe(commandError);
    });
  });
});
