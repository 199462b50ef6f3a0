/**
 * Authentication & Rate Limiting Configuration
 */

/** Header carrying the shared API key */
export const API_KEY_HEADER = 'x-api-key';

/** Signing algorithms accepted for bearer tokens (symmetric only) */
export const SUPPORTED_JWT_ALGORITHMS: readonly string[] = ['HS256'];

/** Minimum JWT signing secret length in bytes (UTF-8) */
export const MIN_JWT_SECRET_BYTES = 32;

/** Methods that require the read scope; DELETE needs the delete scope, anything else write */
export const READ_METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD', 'OPTIONS']);

/** Default Redis key prefix for rate limit counters */
export const DEFAULT_RATE_LIMIT_PREFIX = 'ingest:ratelimit';

/** Default rate limit window in seconds */
export const DEFAULT_RATE_LIMIT_WINDOW_SECONDS = 60;
