import { SignJWT } from 'jose';
import { describe, expect, it } from 'vitest';
import {
  AuthConfig,
  createAuthenticator,
  describeCredential,
  requiredScopeForMethod,
  validateAuthConfig,
} from '../auth';
import { ConfigurationError } from '../errors';
import { signAccessToken } from '../tokens';
import { RequestHeaders } from '../../types/gatekeeper';

const SECRET = 'test-secret-test-secret-test-secret';
const NOW_MS = Date.UTC(2026, 0, 1);
const NOW_S = NOW_MS / 1000;

const scopes = { read: 'ingest:read', write: 'ingest:write', delete: 'ingest:delete' };

function jwtConfig(overrides: Partial<AuthConfig> = {}): AuthConfig {
  return {
    requireApiKey: false,
    apiKey: '',
    requireJwt: true,
    jwtSecret: SECRET,
    jwtAlgorithm: 'HS256',
    jwtAudience: null,
    jwtIssuer: null,
    scopes,
    adminRole: 'admin',
    clockToleranceSeconds: 0,
    ...overrides,
  };
}

const bearer = (token: string) => ({ authorization: `Bearer ${token}` });

const token = (options: Partial<Parameters<typeof signAccessToken>[0]> = {}) =>
  signAccessToken({ secret: SECRET, subject: 'alice', issuedAt: NOW_S, ...options });

describe('requiredScopeForMethod', () => {
  it('maps methods onto read, write and delete scopes', () => {
    expect(['GET', 'HEAD', 'OPTIONS'].map((m) => requiredScopeForMethod(scopes, m))).toEqual([
      'ingest:read',
      'ingest:read',
      'ingest:read',
    ]);
    expect(['POST', 'PUT', 'PATCH'].map((m) => requiredScopeForMethod(scopes, m))).toEqual([
      'ingest:write',
      'ingest:write',
      'ingest:write',
    ]);
    expect(requiredScopeForMethod(scopes, 'delete')).toBe('ingest:delete');
    expect(requiredScopeForMethod(scopes, 'PROPFIND')).toBe('ingest:write');
  });
});

describe('JWT authentication', () => {
  const authenticator = createAuthenticator(jwtConfig(), () => NOW_MS);

  it('admits a token carrying the scope the method needs', async () => {
    const result = await authenticator.authenticate('POST', bearer(await token({ scopes: ['ingest:write'] })));
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.credentials).toEqual([
        {
          kind: 'jwt',
          claims: { sub: 'alice', exp: NOW_S + 3600, scopes: ['ingest:write'], roles: [] },
        },
      ]);
    }
  });

  it('lets the admin role through without any scope', async () => {
    const admin = bearer(await token({ roles: ['admin'] }));
    expect((await authenticator.authenticate('POST', admin)).ok).toBe(true);
    expect((await authenticator.authenticate('DELETE', admin)).ok).toBe(true);
  });

  it('admits a matching scope regardless of a non-admin role', async () => {
    const result = await authenticator.authenticate(
      'PUT',
      bearer(await token({ scopes: ['ingest:write'], roles: ['operator'] }))
    );
    expect(result.ok).toBe(true);
  });

  it('forbids a valid token with neither the scope nor the admin role', async () => {
    const result = await authenticator.authenticate(
      'DELETE',
      bearer(await token({ scopes: ['ingest:read', 'ingest:write'], roles: ['operator'] }))
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.statusCode).toBe(403);
      expect(result.error.code).toBe('FORBIDDEN');
    }
  });

  it('reads scopes from an scp array claim', async () => {
    const jwt = await new SignJWT({ scp: ['ingest:read'] })
      .setProtectedHeader({ alg: 'HS256' })
      .setExpirationTime(NOW_S + 60)
      .sign(new TextEncoder().encode(SECRET));
    const result = await authenticator.authenticate('GET', bearer(jwt));
    expect(result.ok).toBe(true);
  });

  it.each<[string, RequestHeaders]>([
    ['no Authorization header', {}],
    ['a non-bearer scheme', { authorization: 'Basic dXNlcjpwYXNz' }],
    ['an empty bearer token', { authorization: 'Bearer ' }],
    ['a malformed token', { authorization: 'Bearer not.a.jwt' }],
  ])('rejects %s as unauthorized', async (_label, headers) => {
    const result = await authenticator.authenticate('GET', headers);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.statusCode).toBe(401);
      expect(result.error.code).toBe('UNAUTHORIZED');
    }
  });

  it('rejects an expired token even with the right scope', async () => {
    const expired = await token({ scopes: ['ingest:read'], issuedAt: NOW_S - 7200, expiresInSeconds: 3600 });
    const result = await authenticator.authenticate('GET', bearer(expired));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.statusCode).toBe(401);
  });

  it('accepts a recently expired token within the clock tolerance', async () => {
    const lenient = createAuthenticator(jwtConfig({ clockToleranceSeconds: 30 }), () => NOW_MS);
    const recent = await token({ scopes: ['ingest:read'], issuedAt: NOW_S - 70, expiresInSeconds: 60 });
    expect((await lenient.authenticate('GET', bearer(recent))).ok).toBe(true);
    expect((await authenticator.authenticate('GET', bearer(recent))).ok).toBe(false);
  });

  it('rejects a token without exp', async () => {
    const jwt = await new SignJWT({ scope: 'ingest:read' })
      .setProtectedHeader({ alg: 'HS256' })
      .sign(new TextEncoder().encode(SECRET));
    const result = await authenticator.authenticate('GET', bearer(jwt));
    expect(result.ok).toBe(false);
  });

  it('rejects tokens signed with another key or algorithm', async () => {
    const otherKey = await token({ scopes: ['ingest:read'], secret: 'another-secret-another-secret-12345' });
    const otherAlg = await token({ scopes: ['ingest:read'], algorithm: 'HS512' });
    expect((await authenticator.authenticate('GET', bearer(otherKey))).ok).toBe(false);
    expect((await authenticator.authenticate('GET', bearer(otherAlg))).ok).toBe(false);
  });

  it('checks audience and issuer when configured', async () => {
    const strict = createAuthenticator(
      jwtConfig({ jwtAudience: 'ingest-api', jwtIssuer: 'https://issuer.test' }),
      () => NOW_MS
    );
    const good = await token({ scopes: ['ingest:read'], audience: 'ingest-api', issuer: 'https://issuer.test' });
    const wrongAudience = await token({ scopes: ['ingest:read'], audience: 'billing', issuer: 'https://issuer.test' });
    const noIssuer = await token({ scopes: ['ingest:read'], audience: 'ingest-api' });

    expect((await strict.authenticate('GET', bearer(good))).ok).toBe(true);
    expect((await strict.authenticate('GET', bearer(wrongAudience))).ok).toBe(false);
    expect((await strict.authenticate('GET', bearer(noIssuer))).ok).toBe(false);
  });
});

describe('API key authentication', () => {
  const authenticator = createAuthenticator(
    jwtConfig({ requireJwt: false, requireApiKey: true, apiKey: 'test-api-key' })
  );

  it('admits the configured key', async () => {
    const result = await authenticator.authenticate('POST', { 'x-api-key': 'test-api-key' });
    expect(result).toEqual({ ok: true, credentials: [{ kind: 'api_key', key: 'test-api-key' }] });
  });

  it('rejects a wrong or missing key', async () => {
    for (const headers of [{ 'x-api-key': 'test-api-kex' }, { 'x-api-key': '' }, {}]) {
      const result = await authenticator.authenticate('GET', headers);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.statusCode).toBe(401);
    }
  });

  it('requires both credentials when both mechanisms are on', async () => {
    const both = createAuthenticator(
      jwtConfig({ requireApiKey: true, apiKey: 'test-api-key' }),
      () => NOW_MS
    );
    const jwt = await token({ scopes: ['ingest:read'] });

    expect((await both.authenticate('GET', { 'x-api-key': 'test-api-key' })).ok).toBe(false);
    expect((await both.authenticate('GET', bearer(jwt))).ok).toBe(false);

    const result = await both.authenticate('GET', { 'x-api-key': 'test-api-key', ...bearer(jwt) });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.credentials.map(describeCredential)).toEqual(['api_key', 'jwt:alice']);
    }
  });
});

describe('disabled authentication', () => {
  it('admits everything with no credentials', async () => {
    const authenticator = createAuthenticator(jwtConfig({ requireJwt: false }));
    expect(authenticator.enabled).toBe(false);
    expect(await authenticator.authenticate('DELETE', {})).toEqual({ ok: true, credentials: [] });
  });
});

describe('validateAuthConfig', () => {
  it.each<[Partial<AuthConfig>, string]>([
    [{ requireApiKey: true, apiKey: '  ' }, 'REQUIRE_API_KEY=1 requires API_KEY to be set.'],
    [{ jwtSecret: '' }, 'REQUIRE_JWT=1 requires JWT_SECRET to be set.'],
    [{ jwtSecret: 'test-secret' }, 'JWT_SECRET must be at least 32 bytes.'],
    [{ jwtAlgorithm: 'RS256' }, 'JWT_ALGORITHM must be one of: HS256.'],
  ])('refuses %o', (overrides, message) => {
    expect(() => validateAuthConfig(jwtConfig(overrides))).toThrow(ConfigurationError);
    expect(() => validateAuthConfig(jwtConfig(overrides))).toThrow(message);
  });

  it('does not check JWT settings when JWT is off', () => {
    expect(() => validateAuthConfig(jwtConfig({ requireJwt: false, jwtSecret: '' }))).not.toThrow();
  });
});
