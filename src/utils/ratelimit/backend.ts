/**
 * Rate-limit counter backends share one capability: bump the counter for
 * an identity inside a fixed window and report the new count.
 */

export interface FixedWindow {
  /** floor(nowSeconds / lengthSeconds) */
  index: number;
  lengthSeconds: number;
}

export interface BackendHealth {
  ok: boolean;
  detail: string | null;
}

export interface RateLimitBackend {
  readonly name: 'memory' | 'redis';
  /** true when failures should put the limiter into cooldown */
  readonly remote: boolean;
  incrementAndCount(identity: string, window: FixedWindow): Promise<number>;
  checkHealth(): Promise<BackendHealth>;
}

export function windowFor(nowMs: number, lengthSeconds: number): FixedWindow {
  return {
    index: Math.floor(nowMs / 1000 / lengthSeconds),
    lengthSeconds,
  };
}
