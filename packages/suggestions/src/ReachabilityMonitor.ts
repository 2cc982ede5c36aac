/**
 * Reachability Monitor
 *
 * Answers "is the suggestions API reachable?" from the outcomes of real
 * requests, in the manner of a circuit breaker:
 *
 * - ONLINE: requests allowed
 * - OFFLINE: too many consecutive network failures; lookups fall back to cache only
 * - PROBING: recovery window elapsed; exactly one request is let through and
 *   its outcome decides ONLINE or OFFLINE. A probe that never reports (e.g. the
 *   caller gave up) is replaced after another recovery window.
 *
 * Only network-level failures count. An HTTP error response still proves the
 * host is reachable.
 */

import { createLogger, REACHABILITY } from '@site-suggestions/common-types';

const logger = createLogger('ReachabilityMonitor');

export type ReachabilityState = 'online' | 'offline' | 'probing';

/** Connectivity collaborator consulted before falling back to the network */
export interface Connectivity {
  isReachable(): boolean;
}

/** Sink for request outcomes, fed by the REST client */
export interface ReachabilityReporter {
  recordSuccess(): void;
  recordFailure(): void;
}

export interface ReachabilityMonitorOptions {
  /**
   * Consecutive failures before reporting offline
   * @default 3
   */
  failureThreshold?: number;

  /**
   * How long to stay offline before allowing a probe (milliseconds)
   * @default 30000
   */
  recoveryTimeout?: number;

  /** Clock, overridable in tests */
  now?: () => number;
}

export class ReachabilityMonitor implements Connectivity, ReachabilityReporter {
  private state: ReachabilityState = 'online';
  private failures = 0;
  private offlineSince = 0;
  private probeStartedAt = 0;
  private readonly failureThreshold: number;
  private readonly recoveryTimeout: number;
  private readonly now: () => number;

  constructor(options: ReachabilityMonitorOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? REACHABILITY.FAILURE_THRESHOLD;
    this.recoveryTimeout = options.recoveryTimeout ?? REACHABILITY.RECOVERY_TIMEOUT;
    this.now = options.now ?? Date.now;
  }

  isReachable(): boolean {
    if (this.state === 'online') {
      return true;
    }

    const now = this.now();
    if (this.state === 'offline') {
      if (now - this.offlineSince < this.recoveryTimeout) {
        return false;
      }
      logger.info('[ReachabilityMonitor] Recovery window elapsed, allowing probe');
      this.state = 'probing';
      this.probeStartedAt = now;
      return true;
    }

    // Probing: the probe is still out
    if (now - this.probeStartedAt < this.recoveryTimeout) {
      return false;
    }
    logger.info('[ReachabilityMonitor] Probe never reported, allowing another');
    this.probeStartedAt = now;
    return true;
  }

  recordSuccess(): void {
    if (this.state !== 'online') {
      logger.info({ previous: this.state }, '[ReachabilityMonitor] API reachable again');
    }
    this.state = 'online';
    this.failures = 0;
  }

  recordFailure(): void {
    this.failures++;

    if (this.state === 'probing' || this.failures >= this.failureThreshold) {
      if (this.state !== 'offline') {
        logger.warn(
          { failures: this.failures, threshold: this.failureThreshold },
          '[ReachabilityMonitor] API unreachable, serving cached suggestions only'
        );
      }
      this.state = 'offline';
      this.offlineSince = this.now();
    }
  }

  getState(): ReachabilityState {
    return this.state;
  }

  /**
   * Mark reachable immediately, e.g. on an OS connectivity-regained signal
   */
  forceOnline(): void {
    logger.info('[ReachabilityMonitor] Manually marked online');
    this.recordSuccess();
  }
}
