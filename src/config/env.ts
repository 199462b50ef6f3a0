/**
 * Environment Configuration
 *
 * Every setting comes from the environment, is coerced and checked against
 * a TypeBox schema, then cross-checked (backend needs, auth strength,
 * strict-mode guardrails). Any problem throws ConfigurationError so the
 * process never starts half-configured.
 */

import { Static, Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { DEFAULT_RATE_LIMIT_PREFIX, DEFAULT_RATE_LIMIT_WINDOW_SECONDS } from './auth';
import { AuthConfig, validateAuthConfig } from '../utils/auth';
import { ConfigurationError } from '../utils/errors';

const DEFAULT_CORS_METHODS = ['GET', 'POST', 'DELETE', 'OPTIONS'];

const EnvSchema = Type.Object({
  PORT: Type.Integer({ minimum: 1, maximum: 65535, default: 3000 }),
  HOST: Type.String({ default: '0.0.0.0' }),
  LOG_LEVEL: Type.Union(
    ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'].map((level) => Type.Literal(level)),
    { default: 'info' }
  ),

  RATE_LIMIT_PER_MINUTE: Type.Integer({ minimum: 0, default: 0 }),
  RATE_LIMIT_BACKEND: Type.Union([Type.Literal('memory'), Type.Literal('redis')], { default: 'memory' }),
  REDIS_URL: Type.String({ default: '' }),
  RATE_LIMIT_REDIS_PREFIX: Type.String({ minLength: 1, default: DEFAULT_RATE_LIMIT_PREFIX }),
  RATE_LIMIT_WINDOW_SECONDS: Type.Integer({ exclusiveMinimum: 0, default: DEFAULT_RATE_LIMIT_WINDOW_SECONDS }),
  RATE_LIMIT_REDIS_FAILURE_COOLDOWN_SECONDS: Type.Integer({ exclusiveMinimum: 0, default: 5 }),
  RATE_LIMIT_REDIS_TIMEOUT_MS: Type.Integer({ exclusiveMinimum: 0, default: 200 }),
  RATE_LIMIT_FAIL_OPEN: Type.Boolean({ default: true }),

  TRUSTED_PROXY_CIDRS: Type.String({ default: '' }),
  MAX_REQUEST_BODY_BYTES: Type.Integer({ exclusiveMinimum: 0, default: 1024 * 1024 }),

  REQUIRE_API_KEY: Type.Boolean({ default: false }),
  API_KEY: Type.String({ default: '' }),
  REQUIRE_JWT: Type.Boolean({ default: false }),
  JWT_SECRET: Type.String({ default: '' }),
  JWT_ALGORITHM: Type.String({ default: 'HS256' }),
  JWT_AUDIENCE: Type.String({ default: '' }),
  JWT_ISSUER: Type.String({ default: '' }),
  JWT_SCOPE_READ: Type.String({ minLength: 1, default: 'ingest:read' }),
  JWT_SCOPE_WRITE: Type.String({ minLength: 1, default: 'ingest:write' }),
  JWT_SCOPE_DELETE: Type.String({ minLength: 1, default: 'ingest:delete' }),
  JWT_ADMIN_ROLE: Type.String({ default: 'admin' }),
  JWT_CLOCK_TOLERANCE_SECONDS: Type.Integer({ minimum: 0, maximum: 300, default: 0 }),

  SECURITY_STRICT_MODE: Type.Boolean({ default: false }),
  CORS_ALLOW_ORIGINS: Type.String({ default: '*' }),
  CORS_ALLOW_METHODS: Type.String({ default: DEFAULT_CORS_METHODS.join(',') }),
  CORS_ALLOW_HEADERS: Type.String({ default: '*' }),
  ALLOWED_HOSTS: Type.String({ default: '*' }),
});

export type Env = Static<typeof EnvSchema>;

export interface RateLimitConfig {
  /** requests per window per client; 0 disables limiting */
  perMinute: number;
  backend: 'memory' | 'redis';
  redisUrl: string;
  redisPrefix: string;
  windowSeconds: number;
  cooldownSeconds: number;
  timeoutMs: number;
  failOpen: boolean;
}

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  rateLimit: RateLimitConfig;
  trustedProxyCidrs: string[];
  maxRequestBodyBytes: number;
  auth: AuthConfig;
  strictSecurityMode: boolean;
  corsAllowOrigins: string[];
  corsAllowMethods: string[];
  corsAllowHeaders: string[];
  allowedHosts: string[];
}

function parseCsv(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseEnv(env: NodeJS.ProcessEnv): Env {
  const raw: Record<string, unknown> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      raw[key] = value.trim();
    }
  }

  const converted = Value.Convert(EnvSchema, Value.Default(EnvSchema, raw));
  if (!Value.Check(EnvSchema, converted)) {
    const first = Value.Errors(EnvSchema, converted).First();
    const variable = first ? first.path.replace(/^\//, '') : 'environment';
    throw new ConfigurationError(`Invalid ${variable}: ${first ? first.message : 'invalid value'}`);
  }
  return converted;
}

/** Cross-field rules the schema cannot express */
export function validateConfig(config: AppConfig): void {
  if (config.rateLimit.backend === 'redis' && !config.rateLimit.redisUrl) {
    throw new ConfigurationError('RATE_LIMIT_BACKEND=redis requires REDIS_URL to be set.');
  }

  validateAuthConfig(config.auth);

  if (!config.strictSecurityMode) return;

  if (!(config.auth.requireApiKey || config.auth.requireJwt)) {
    throw new ConfigurationError('Strict security mode requires REQUIRE_API_KEY=1 or REQUIRE_JWT=1.');
  }
  if (config.allowedHosts.includes('*')) {
    throw new ConfigurationError('Strict security mode requires explicit ALLOWED_HOSTS (wildcard is not allowed).');
  }
  if (config.corsAllowOrigins.includes('*')) {
    throw new ConfigurationError(
      'Strict security mode requires explicit CORS_ALLOW_ORIGINS (wildcard is not allowed).'
    );
  }
  if (config.rateLimit.perMinute <= 0) {
    throw new ConfigurationError('Strict security mode requires RATE_LIMIT_PER_MINUTE > 0.');
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = parseEnv(env);

  const hosts = parseCsv(parsed.ALLOWED_HOSTS);
  const origins = parseCsv(parsed.CORS_ALLOW_ORIGINS);
  const methods = parseCsv(parsed.CORS_ALLOW_METHODS).map((method) => method.toUpperCase());
  const headers = parseCsv(parsed.CORS_ALLOW_HEADERS);

  const config: AppConfig = {
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    rateLimit: {
      perMinute: parsed.RATE_LIMIT_PER_MINUTE,
      backend: parsed.RATE_LIMIT_BACKEND,
      redisUrl: parsed.REDIS_URL,
      redisPrefix: parsed.RATE_LIMIT_REDIS_PREFIX,
      windowSeconds: parsed.RATE_LIMIT_WINDOW_SECONDS,
      cooldownSeconds: parsed.RATE_LIMIT_REDIS_FAILURE_COOLDOWN_SECONDS,
      timeoutMs: parsed.RATE_LIMIT_REDIS_TIMEOUT_MS,
      failOpen: parsed.RATE_LIMIT_FAIL_OPEN,
    },
    trustedProxyCidrs: parseCsv(parsed.TRUSTED_PROXY_CIDRS),
    maxRequestBodyBytes: parsed.MAX_REQUEST_BODY_BYTES,
    auth: {
      requireApiKey: parsed.REQUIRE_API_KEY,
      apiKey: parsed.API_KEY,
      requireJwt: parsed.REQUIRE_JWT,
      jwtSecret: parsed.JWT_SECRET,
      jwtAlgorithm: parsed.JWT_ALGORITHM,
      jwtAudience: parsed.JWT_AUDIENCE || null,
      jwtIssuer: parsed.JWT_ISSUER || null,
      scopes: {
        read: parsed.JWT_SCOPE_READ,
        write: parsed.JWT_SCOPE_WRITE,
        delete: parsed.JWT_SCOPE_DELETE,
      },
      adminRole: parsed.JWT_ADMIN_ROLE,
      clockToleranceSeconds: parsed.JWT_CLOCK_TOLERANCE_SECONDS,
    },
    strictSecurityMode: parsed.SECURITY_STRICT_MODE,
    corsAllowOrigins: origins.length > 0 ? origins : ['*'],
    corsAllowMethods: methods.length > 0 ? methods : [...DEFAULT_CORS_METHODS],
    corsAllowHeaders: headers.length > 0 ? headers : ['*'],
    allowedHosts: hosts.length > 0 ? hosts : ['*'],
  };

  validateConfig(config);
  return config;
}
