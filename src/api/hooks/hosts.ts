/**
 * Host Allowlist Hook
 *
 * Rejects requests whose Host header is not in ALLOWED_HOSTS. Entries may
 * be exact hostnames or "*.example.com" suffix patterns; a lone "*" allows
 * everything (and is refused by strict mode at startup).
 */

import { FastifyRequest } from 'fastify';
import { BadRequestError } from '../../utils/errors';

export function isHostAllowed(hostname: string, allowedHosts: string[]): boolean {
  const host = hostname.toLowerCase();
  return allowedHosts.some((pattern) => {
    const candidate = pattern.toLowerCase();
    if (candidate === '*') return true;
    if (candidate.startsWith('*.')) return host.endsWith(candidate.slice(1));
    return host === candidate;
  });
}

/** Hostname without port; IPv6 literals keep their brackets */
function hostnameOf(hostHeader: string | undefined): string {
  const value = (hostHeader ?? '').trim();
  if (value.startsWith('[')) {
    const end = value.indexOf(']');
    return end === -1 ? value : value.slice(0, end + 1);
  }
  return value.split(':', 1)[0];
}

export function createHostAllowlistHook(allowedHosts: string[]) {
  return async function hostAllowlistHook(request: FastifyRequest): Promise<void> {
    if (!isHostAllowed(hostnameOf(request.headers.host), allowedHosts)) {
      throw new BadRequestError('Invalid host header');
    }
  };
}
