/**
 * Tests for Logger Utility
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

describe('createLogger', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    vi.resetModules();
    process.env = { ...originalEnv };
    delete process.env.ENABLE_PRETTY_LOGS;
  });

  afterEach(() => {
    vi.doUnmock('pino');
    process.env = originalEnv;
  });

  it('should create a logger with default level info', async () => {
    delete process.env.LOG_LEVEL;

    const { createLogger } = await import('./logger.js');
    const logger = createLogger('test-logger');

    expect(logger.level).toBe('info');
  });

  it('should use LOG_LEVEL env var', async () => {
    process.env.LOG_LEVEL = 'debug';

    const { createLogger } = await import('./logger.js');

    expect(createLogger('test-logger').level).toBe('debug');
  });

  it('should include name in logger', async () => {
    const { createLogger } = await import('./logger.js');
    const logger = createLogger('SuggestionService');

    expect(logger.bindings().name).toBe('SuggestionService');
  });

  it('should route output through pino-pretty only when enabled', async () => {
    const pinoSpy = vi.fn((_options: unknown) => ({}));
    vi.doMock('pino', () => ({ pino: pinoSpy }));
    process.env.ENABLE_PRETTY_LOGS = 'true';

    const { createLogger } = await import('./logger.js');
    createLogger('pretty');
    delete process.env.ENABLE_PRETTY_LOGS;
    createLogger('plain');

    expect(pinoSpy).toHaveBeenNthCalledWith(
      1,
      expect.objectContaining({
        transport: { target: 'pino-pretty', options: { colorize: true } },
      })
    );
    expect(pinoSpy).toHaveBeenNthCalledWith(
      2,
      expect.not.objectContaining({ transport: expect.anything() })
    );
  });

  it('should not throw when logging unusual err values', async () => {
    const { createLogger } = await import('./logger.js');
    const logger = createLogger('test');

    expect(() => {
      logger.error({ err: null }, 'Null error');
      logger.error({ err: 'plain string' }, 'String error');
      logger.error({ err: { code: 'ECONNRESET' } }, 'Plain object error');
    }).not.toThrow();
  });
});

describe('serializeError', () => {
  it('should serialize message and recursive cause', async () => {
    const { serializeError } = await import('./logger.js');
    const cause = new Error('socket hang up');
    const error = new Error('request failed', { cause });

    expect(serializeError(error)).toMatchObject({
      type: 'Error',
      message: 'request failed',
      cause: { type: 'Error', message: 'socket hang up' },
    });
  });

  it('should keep custom properties and redact sensitive ones', async () => {
    const { serializeError } = await import('./logger.js');
    const error = Object.assign(new Error('lookup failed'), {
      kind: 'timeout',
      siteId: '42',
      token: 'test-token',
    });

    expect(serializeError(error)).toMatchObject({
      kind: 'timeout',
      siteId: '42',
      token: '[REDACTED]',
    });
  });

  it('should sanitize credentials inside the message', async () => {
    const { serializeError } = await import('./logger.js');
    const error = new Error('401 for Bearer test-token');

    expect(serializeError(error)).toMatchObject({ message: '401 for Bearer [REDACTED]' });
  });

  it('should flag plain objects', async () => {
    const { serializeError } = await import('./logger.js');

    expect(serializeError({ code: 'ETIMEDOUT' })).toEqual({
      type: 'Object',
      _nonErrorObject: true,
      code: 'ETIMEDOUT',
    });
  });

  it('should serialize primitives', async () => {
    const { serializeError } = await import('./logger.js');

    expect(serializeError('boom')).toEqual({ type: 'string', value: 'boom' });
    expect(serializeError(null)).toEqual({ type: 'null', value: null });
  });

  it('should mark self-referencing causes as circular', async () => {
    const { serializeError } = await import('./logger.js');
    const error = new Error('loop');
    Object.defineProperty(error, 'cause', { value: error });

    expect(serializeError(error)).toMatchObject({ cause: '[Circular]' });
  });
});
