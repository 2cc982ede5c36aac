/**
 * Timing Constants
 *
 * Timeouts, reachability windows, and Redis connection settings.
 */

/**
 * Timeouts for outbound operations
 */
export const TIMEOUTS = {
  /** Suggestion fetch timeout, covering request, decode and store write (15 seconds) */
  SUGGESTION_FETCH: 15000,
} as const;

/**
 * Reachability monitor defaults
 */
export const REACHABILITY = {
  /** Consecutive network-level failures before the API is reported unreachable */
  FAILURE_THRESHOLD: 3,
  /** How long to report unreachable before allowing a probe request (30 seconds) */
  RECOVERY_TIMEOUT: 30000,
} as const;

/**
 * Redis connection timeouts
 */
export const REDIS_CONNECTION = {
  /** Connection establishment timeout (10 seconds) */
  CONNECT_TIMEOUT: 10000,
  /** Per-command timeout (5 seconds) */
  COMMAND_TIMEOUT: 5000,
  /** TCP keepalive initial delay (30 seconds) */
  KEEPALIVE: 30000,
} as const;

/**
 * Redis retry configuration
 */
export const RETRY_CONFIG = {
  /** Reconnection attempts before giving up */
  REDIS_MAX_RETRIES: 10,
  /** Base delay multiplier for Redis retries (milliseconds) */
  REDIS_RETRY_MULTIPLIER: 100,
  /** Maximum delay for Redis retries (3 seconds) */
  REDIS_MAX_DELAY: 3000,
  /** Max retries per Redis request */
  REDIS_RETRIES_PER_REQUEST: 3,
} as const;
