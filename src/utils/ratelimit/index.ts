/**
 * Fixed-Window Rate Limiter
 *
 * Owns the backend and the degradation state. When a remote backend fails
 * (error or timeout) the limiter enters a cooldown: until it elapses no
 * backend call is made and every request gets the static fail-open or
 * fail-closed decision. The first success after cooldown clears the state;
 * a renewed failure restarts it.
 */

import { RateLimitDecision } from '../../types/gatekeeper';
import { Logger, logger as defaultLogger } from '../logger';
import { BackendHealth, RateLimitBackend, windowFor } from './backend';

export { MemoryRateLimitBackend } from './memory';
export { RedisRateLimitBackend } from './redis';
export type { RedisCounterClient } from './redis';
export type { RateLimitBackend, FixedWindow, BackendHealth } from './backend';

export interface RateLimiterOptions {
  /** requests per window; 0 disables limiting */
  limit: number;
  windowSeconds: number;
  cooldownSeconds: number;
  failOpen: boolean;
  clock?: () => number;
  logger?: Logger;
  onDegraded?: (decision: RateLimitDecision) => void;
}

export class RateLimiter {
  readonly limit: number;
  private readonly windowSeconds: number;
  private readonly cooldownMs: number;
  private readonly failOpen: boolean;
  private readonly clock: () => number;
  private readonly log: Logger;
  private readonly onDegraded?: (decision: RateLimitDecision) => void;
  private degradedUntil = 0;

  constructor(
    readonly backend: RateLimitBackend,
    options: RateLimiterOptions
  ) {
    this.limit = Math.max(0, options.limit);
    this.windowSeconds = Math.max(1, options.windowSeconds);
    this.cooldownMs = Math.max(1, options.cooldownSeconds) * 1000;
    this.failOpen = options.failOpen;
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? defaultLogger;
    this.onDegraded = options.onDegraded;
  }

  get enabled(): boolean {
    return this.limit > 0;
  }

  /** True while the remote backend is being skipped */
  isDegraded(now = this.clock()): boolean {
    return now < this.degradedUntil;
  }

  async check(identity: string): Promise<RateLimitDecision> {
    const now = this.clock();
    const window = windowFor(now, this.windowSeconds);
    const windowEndsMs = (window.index + 1) * this.windowSeconds * 1000;
    const remainingWindowSeconds = Math.max(1, Math.ceil((windowEndsMs - now) / 1000));

    if (!this.enabled) {
      return { allowed: true, remainingWindowSeconds, reason: 'OK', limit: 0, remaining: 0 };
    }

    if (this.backend.remote && this.isDegraded(now)) {
      return this.degradedDecision(remainingWindowSeconds);
    }

    let count: number;
    try {
      count = await this.backend.incrementAndCount(identity, window);
    } catch (err) {
      if (!this.backend.remote) throw err;
      // cooldown starts when the failure is observed, not when the call began
      this.degradedUntil = this.clock() + this.cooldownMs;
      this.log.warn(
        {
          err,
          backend: this.backend.name,
          fail_open: this.failOpen,
          cooldown_seconds: this.cooldownMs / 1000,
        },
        'rate_limit_backend_error'
      );
      return this.degradedDecision(remainingWindowSeconds);
    }

    // a call that began before another request's failure must not end that cooldown
    if (this.degradedUntil !== 0 && this.clock() >= this.degradedUntil) {
      this.degradedUntil = 0;
    }
    const allowed = count <= this.limit;
    return {
      allowed,
      remainingWindowSeconds,
      reason: allowed ? 'OK' : 'LIMIT_EXCEEDED',
      limit: this.limit,
      remaining: Math.max(0, this.limit - count),
    };
  }

  async checkHealth(): Promise<BackendHealth> {
    if (!this.enabled) {
      return { ok: true, detail: 'rate limit disabled' };
    }
    return this.backend.checkHealth();
  }

  private degradedDecision(remainingWindowSeconds: number): RateLimitDecision {
    const decision: RateLimitDecision = {
      allowed: this.failOpen,
      remainingWindowSeconds,
      reason: this.failOpen ? 'BACKEND_DEGRADED_OPEN' : 'BACKEND_DEGRADED_CLOSED',
      limit: this.limit,
      remaining: 0,
    };
    this.onDegraded?.(decision);
    return decision;
  }
}
