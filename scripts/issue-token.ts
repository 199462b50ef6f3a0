/**
 * Issue Token
 *
 * CLI tool to mint a bearer token for local testing, signed with the
 * JWT_SECRET the server uses.
 *
 * Usage: npm run issue-token -- <subject> [scope,scope...] [role,role...]
 * Example: npm run issue-token -- alice ingest:read,ingest:write
 */

import { loadConfig } from '../src/config/env';
import { signAccessToken } from '../src/utils/tokens';

function splitList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

async function main() {
  const subject = process.argv[2];
  if (!subject) {
    console.log('Usage: npm run issue-token -- <subject> [scope,scope...] [role,role...]');
    console.log('Example: npm run issue-token -- alice ingest:read,ingest:write');
    process.exit(1);
  }

  const config = loadConfig();
  if (!config.auth.jwtSecret) {
    console.log('JWT_SECRET is not set');
    process.exit(1);
  }

  const scopes = splitList(process.argv[3]);
  const roles = splitList(process.argv[4]);

  const token = await signAccessToken({
    secret: config.auth.jwtSecret,
    algorithm: config.auth.jwtAlgorithm,
    subject,
    scopes,
    roles,
    audience: config.auth.jwtAudience ?? undefined,
    issuer: config.auth.jwtIssuer ?? undefined,
  });

  console.log('\nToken issued:');
  console.log(`  Subject: ${subject}`);
  console.log(`  Scopes:  ${scopes.join(' ') || '(none)'}`);
  console.log(`  Roles:   ${roles.join(' ') || '(none)'}`);
  console.log(`\nUse with: -H "Authorization: Bearer ${token}"`);
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
