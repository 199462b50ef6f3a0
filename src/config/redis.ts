import Redis from 'ioredis';
import { logger } from '../utils/logger';
import { RedisCounterClient } from '../utils/ratelimit';

/**
 * Redis client for the shared rate-limit counters.
 *
 * Commands must fail fast instead of queueing while the connection is
 * down: no offline queue, no per-request retries, and a command timeout
 * matching the limiter's own timeout. The client keeps reconnecting in the
 * background; the limiter's cooldown decides when to try it again.
 */
export function createRedisClient(url: string, timeoutMs: number): Redis {
  const redis = new Redis(url, {
    commandTimeout: timeoutMs,
    connectTimeout: Math.max(timeoutMs, 1000),
    enableOfflineQueue: false,
    maxRetriesPerRequest: 0,
  });

  redis.on('connect', () => {
    logger.info('Connected to Redis');
  });

  redis.on('error', (err) => {
    logger.warn({ err }, 'Redis error');
  });

  return redis;
}

/** Narrow an ioredis client to what the counter backend calls */
export function toCounterClient(redis: Redis): RedisCounterClient {
  return {
    eval: (script, numkeys, ...args) => redis.eval(script, numkeys, ...args),
    ping: () => redis.ping(),
  };
}
