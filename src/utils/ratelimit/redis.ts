/**
 * Redis Fixed-Window Counter
 *
 * Shares one limit across every service instance. The counter lives at
 * {prefix}:{windowIndex}:{identity}; INCR and the first EXPIRE run inside
 * one Lua script so the store does the atomic increment.
 *
 * Every call is raced against a short timeout. A timeout rejects with
 * BackendDegradedError exactly like a Redis error does, and the limiter
 * turns either into a cooldown.
 */

import { BackendDegradedError } from '../errors';
import { BackendHealth, FixedWindow, RateLimitBackend } from './backend';

const WINDOW_SCRIPT = `
local current = redis.call("INCR", KEYS[1])
if current == 1 then
  redis.call("EXPIRE", KEYS[1], tonumber(ARGV[1]))
end
return current
`;

/** The slice of an ioredis client this backend needs */
export interface RedisCounterClient {
  eval(script: string, numkeys: number, ...args: (string | number)[]): Promise<unknown>;
  ping(): Promise<string>;
}

export interface RedisBackendOptions {
  keyPrefix: string;
  timeoutMs: number;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class RedisRateLimitBackend implements RateLimitBackend {
  readonly name = 'redis';
  readonly remote = true;

  constructor(
    private readonly client: RedisCounterClient,
    private readonly options: RedisBackendOptions
  ) {}

  keyFor(identity: string, window: FixedWindow): string {
    return `${this.options.keyPrefix}:${window.index}:${identity}`;
  }

  async incrementAndCount(identity: string, window: FixedWindow): Promise<number> {
    const key = this.keyFor(identity, window);
    let result: unknown;
    try {
      result = await this.withTimeout(this.client.eval(WINDOW_SCRIPT, 1, key, window.lengthSeconds));
    } catch (err) {
      if (err instanceof BackendDegradedError) throw err;
      throw new BackendDegradedError(`Redis rate-limit call failed: ${describeError(err)}`, { cause: err });
    }

    const count = Number(result);
    if (!Number.isInteger(count) || count < 1) {
      throw new BackendDegradedError(`Unexpected rate-limit counter value: ${String(result)}`);
    }
    return count;
  }

  async checkHealth(): Promise<BackendHealth> {
    try {
      await this.withTimeout(this.client.ping());
      return { ok: true, detail: null };
    } catch (err) {
      return { ok: false, detail: describeError(err) };
    }
  }

  private withTimeout<T>(operation: Promise<T>): Promise<T> {
    const { timeoutMs } = this.options;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new BackendDegradedError(`Redis rate-limit call timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    return Promise.race([operation, timeout]).finally(() => clearTimeout(timer));
  }
}
