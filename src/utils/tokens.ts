import { SignJWT } from 'jose';

export interface AccessTokenOptions {
  secret: string;
  algorithm?: string;
  subject?: string;
  scopes?: string[];
  roles?: string[];
  audience?: string;
  issuer?: string;
  /** seconds until exp, relative to issuedAt */
  expiresInSeconds?: number;
  /** epoch seconds; defaults to now */
  issuedAt?: number;
}

/**
 * Sign a bearer token the authenticator accepts. Used by the issue-token
 * script and the tests; the service itself only verifies.
 */
export async function signAccessToken(options: AccessTokenOptions): Promise<string> {
  const issuedAt = options.issuedAt ?? Math.floor(Date.now() / 1000);
  const claims: Record<string, unknown> = {};
  if (options.scopes && options.scopes.length > 0) claims.scope = options.scopes.join(' ');
  if (options.roles && options.roles.length > 0) claims.roles = options.roles;

  let jwt = new SignJWT(claims)
    .setProtectedHeader({ alg: options.algorithm ?? 'HS256', typ: 'JWT' })
    .setIssuedAt(issuedAt)
    .setExpirationTime(issuedAt + (options.expiresInSeconds ?? 3600));

  if (options.subject) jwt = jwt.setSubject(options.subject);
  if (options.audience) jwt = jwt.setAudience(options.audience);
  if (options.issuer) jwt = jwt.setIssuer(options.issuer);

  return jwt.sign(new TextEncoder().encode(options.secret));
}
