// Export config (runtime environment variables)
export * from './config/index.js';

// Export constants (compile-time constants)
export * from './constants/index.js';

// Export types
export * from './types/suggestions.js';

// Export schemas
export * from './types/schemas/index.js';

// Export utilities
export { createLogger, serializeError } from './utils/logger.js';
export { sanitizeLogMessage, sanitizeObject } from './utils/logSanitizer.js';
export {
  parseRedisUrl,
  createRedisOptions,
  createRedisClient,
  redisRetryStrategy,
  resolveRedisConnection,
  type RedisConnectionConfig,
} from './utils/redis.js';
