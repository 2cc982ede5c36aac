import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { sanitizeLogMessage, sanitizeObject } from './logSanitizer.js';

/** Properties already handled by standard extraction */
const HANDLED_PROPS = new Set(['type', 'message', 'stack', 'cause', 'name']);

/** Non-enumerable properties common on Node.js and fetch errors */
const NODE_ERROR_PROPS = ['code', 'errno', 'syscall', 'status'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Serialize anything passed as `err`.
 *
 * - Errors keep message, stack, and a recursively serialized `cause`
 * - Extra own properties (e.g. a SuggestionError's `kind` and `siteId`) are kept
 * - Plain objects are flagged with `_nonErrorObject` so they are easy to grep for
 * - Every string is passed through the log sanitizer
 */
export function serializeError(err: unknown, depth = 0): object {
  if (!isRecord(err)) {
    return {
      type: err === null || err === undefined ? 'null' : typeof err,
      value: typeof err === 'string' ? sanitizeLogMessage(err) : err,
    };
  }

  const constructorName = err.constructor?.name;
  const serialized: Record<string, unknown> = {
    type:
      constructorName !== undefined && constructorName !== 'Object'
        ? constructorName
        : typeof err.name === 'string' && err.name !== ''
          ? err.name
          : 'Object',
  };
  if (serialized.type === 'Object') {
    serialized._nonErrorObject = true;
  }

  if (typeof err.message === 'string') {
    serialized.message = sanitizeLogMessage(err.message);
  }
  if (typeof err.stack === 'string') {
    serialized.stack = sanitizeLogMessage(err.stack);
  }
  if (err.cause !== undefined) {
    serialized.cause =
      err.cause === err || depth >= 5 ? '[Circular]' : serializeError(err.cause, depth + 1);
  }

  const extras: Record<string, unknown> = {};
  for (const key of Object.keys(err)) {
    const value = err[key];
    if (HANDLED_PROPS.has(key) || typeof value === 'function') {
      continue;
    }
    extras[key] = value;
  }
  const sanitizedExtras = sanitizeObject(extras);
  if (isRecord(sanitizedExtras)) {
    Object.assign(serialized, sanitizedExtras);
  }

  if (err instanceof Error) {
    for (const key of NODE_ERROR_PROPS) {
      if (!(key in serialized) && key in err && err[key] !== undefined) {
        serialized[key] = err[key];
      }
    }
  }

  return serialized;
}

/**
 * Creates a logger instance with environment-aware configuration.
 * Uses pino-pretty transport ONLY when explicitly enabled via ENABLE_PRETTY_LOGS=true.
 * Defaults to plain JSON logging.
 *
 * Log errors as `logger.error({ err: error }, 'What failed')` so the
 * err serializer picks them up; `logger.error('msg', error)` drops the stack.
 */
export function createLogger(name?: string): Logger {
  const usePrettyLogs = process.env.ENABLE_PRETTY_LOGS === 'true';

  const config: LoggerOptions = {
    level: process.env.LOG_LEVEL ?? 'info',
    name,
    serializers: {
      err: (err: unknown) => serializeError(err),
    },
    formatters: {
      log: (object: Record<string, unknown>) => {
        const sanitized = sanitizeObject(object);
        return isRecord(sanitized) ? sanitized : object;
      },
    },
  };

  // pino-pretty is loaded by name in a worker thread, so it is a runtime dependency
  if (usePrettyLogs) {
    config.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(config);
}
