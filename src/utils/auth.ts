/**
 * Authenticator
 *
 * Two independently enabled mechanisms:
 * - API key: exact, constant-time match of the X-API-Key header
 * - JWT bearer: signature (single symmetric algorithm), exp, optional aud/iss,
 *   then per-method scope authorization with an admin-role bypass
 *
 * When both are enabled both must pass. Configuration problems throw
 * ConfigurationError from createAuthenticator, never per request.
 */

import { createHash, timingSafeEqual } from 'crypto';
import { jwtVerify, JWTPayload } from 'jose';
import {
  API_KEY_HEADER,
  MIN_JWT_SECRET_BYTES,
  READ_METHODS,
  SUPPORTED_JWT_ALGORITHMS,
} from '../config/auth';
import { Credential, JwtClaims, RequestHeaders } from '../types/gatekeeper';
import { ConfigurationError, CredentialError } from './errors';

export interface ScopeConfig {
  read: string;
  write: string;
  delete: string;
}

export interface AuthConfig {
  requireApiKey: boolean;
  apiKey: string;
  requireJwt: boolean;
  jwtSecret: string;
  jwtAlgorithm: string;
  jwtAudience: string | null;
  jwtIssuer: string | null;
  scopes: ScopeConfig;
  adminRole: string;
  clockToleranceSeconds: number;
}

export type AuthResult =
  | { ok: true; credentials: Credential[] }
  | { ok: false; error: CredentialError };

export interface Authenticator {
  readonly enabled: boolean;
  authenticate(method: string, headers: RequestHeaders): Promise<AuthResult>;
}

function headerValue(headers: RequestHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function constantTimeEquals(a: string, b: string): boolean {
  const left = createHash('sha256').update(a).digest();
  const right = createHash('sha256').update(b).digest();
  return timingSafeEqual(left, right);
}

function extractValues(payload: JWTPayload, ...keys: string[]): string[] {
  const values = new Set<string>();
  for (const key of keys) {
    const raw = payload[key];
    if (typeof raw === 'string') {
      raw.split(/\s+/).filter(Boolean).forEach((v) => values.add(v));
    } else if (Array.isArray(raw)) {
      raw.filter((v): v is string => typeof v === 'string' && v.length > 0).forEach((v) => values.add(v));
    }
  }
  return [...values];
}

function toClaims(payload: JWTPayload): JwtClaims | null {
  if (typeof payload.exp !== 'number') return null;
  return {
    sub: payload.sub,
    exp: payload.exp,
    aud: payload.aud,
    iss: payload.iss,
    scopes: extractValues(payload, 'scope', 'scp'),
    roles: extractValues(payload, 'role', 'roles'),
  };
}

export function requiredScopeForMethod(scopes: ScopeConfig, method: string): string {
  const upper = method.toUpperCase();
  if (READ_METHODS.has(upper)) return scopes.read;
  if (upper === 'DELETE') return scopes.delete;
  return scopes.write;
}

/** Admin role bypasses scope checks entirely */
export function isAuthorized(claims: JwtClaims, method: string, config: Pick<AuthConfig, 'scopes' | 'adminRole'>): boolean {
  if (config.adminRole && claims.roles.includes(config.adminRole)) {
    return true;
  }
  return claims.scopes.includes(requiredScopeForMethod(config.scopes, method));
}

/** Short subject for logs; never includes key material */
export function describeCredential(credential: Credential): string {
  switch (credential.kind) {
    case 'api_key':
      return 'api_key';
    case 'jwt':
      return `jwt:${credential.claims.sub ?? 'anonymous'}`;
    default: {
      const unreachable: never = credential;
      return unreachable;
    }
  }
}

export function validateAuthConfig(config: AuthConfig): void {
  if (config.requireApiKey && !config.apiKey.trim()) {
    throw new ConfigurationError('REQUIRE_API_KEY=1 requires API_KEY to be set.');
  }
  if (!config.requireJwt) return;

  if (!config.jwtSecret.trim()) {
    throw new ConfigurationError('REQUIRE_JWT=1 requires JWT_SECRET to be set.');
  }
  if (Buffer.byteLength(config.jwtSecret, 'utf8') < MIN_JWT_SECRET_BYTES) {
    throw new ConfigurationError(`JWT_SECRET must be at least ${MIN_JWT_SECRET_BYTES} bytes.`);
  }
  if (!SUPPORTED_JWT_ALGORITHMS.includes(config.jwtAlgorithm.toUpperCase())) {
    throw new ConfigurationError(`JWT_ALGORITHM must be one of: ${SUPPORTED_JWT_ALGORITHMS.join(', ')}.`);
  }
}

export function createAuthenticator(config: AuthConfig, clock: () => number = Date.now): Authenticator {
  validateAuthConfig(config);

  const secretKey = new TextEncoder().encode(config.jwtSecret);
  const algorithm = config.jwtAlgorithm.toUpperCase();

  const verifyApiKey = (headers: RequestHeaders): Credential | null => {
    const provided = headerValue(headers, API_KEY_HEADER);
    if (!provided || !constantTimeEquals(provided, config.apiKey)) return null;
    return { kind: 'api_key', key: provided };
  };

  const verifyBearer = async (headers: RequestHeaders): Promise<JwtClaims | null> => {
    const authorization = headerValue(headers, 'authorization');
    if (!authorization) return null;

    const [scheme, ...rest] = authorization.trim().split(/\s+/);
    const token = rest.join(' ');
    if (scheme.toLowerCase() !== 'bearer' || !token) return null;

    try {
      const { payload } = await jwtVerify(token, secretKey, {
        algorithms: [algorithm],
        audience: config.jwtAudience ?? undefined,
        issuer: config.jwtIssuer ?? undefined,
        requiredClaims: ['exp'],
        clockTolerance: config.clockToleranceSeconds,
        currentDate: new Date(clock()),
      });
      return toClaims(payload);
    } catch {
      // Every verification failure is the same 401 to the caller
      return null;
    }
  };

  return {
    enabled: config.requireApiKey || config.requireJwt,

    async authenticate(method, headers) {
      const credentials: Credential[] = [];

      if (config.requireApiKey) {
        const credential = verifyApiKey(headers);
        if (!credential) return { ok: false, error: CredentialError.unauthorized() };
        credentials.push(credential);
      }

      if (config.requireJwt) {
        const claims = await verifyBearer(headers);
        if (!claims) return { ok: false, error: CredentialError.unauthorized() };
        if (!isAuthorized(claims, method, config)) {
          return { ok: false, error: CredentialError.forbidden() };
        }
        credentials.push({ kind: 'jwt', claims });
      }

      return { ok: true, credentials };
    },
  };
}
