/**
 * Proxy Identity Resolver
 *
 * Derives the client address used for rate limiting and logging.
 * X-Forwarded-For is honoured only when the direct peer sits inside one of
 * the configured trusted proxy ranges; everything else resolves to the peer.
 */

import { BlockList, isIP } from 'net';
import { ClientIdentity } from '../types/gatekeeper';
import { ConfigurationError } from './errors';

const UNKNOWN_PEER = 'unknown';
const IPV4_MAPPED_PREFIX = '::ffff:';

export interface ProxyIdentityResolver {
  resolve(peerAddress: string | undefined, forwardedFor: string | string[] | undefined): ClientIdentity;
}

function parseCidr(raw: string): { network: string; prefix: number; family: 'ipv4' | 'ipv6' } {
  const [network, prefixText] = raw.split('/', 2);
  const version = isIP(network);
  if (version === 0) {
    throw new ConfigurationError(`Invalid TRUSTED_PROXY_CIDRS entry: ${raw}`);
  }

  const maxPrefix = version === 4 ? 32 : 128;
  const prefix = prefixText === undefined ? maxPrefix : Number(prefixText);
  if (!Number.isInteger(prefix) || prefix < 0 || prefix > maxPrefix) {
    throw new ConfigurationError(`Invalid TRUSTED_PROXY_CIDRS entry: ${raw}`);
  }

  return { network, prefix, family: version === 4 ? 'ipv4' : 'ipv6' };
}

/** Strip the IPv4-mapped prefix so "::ffff:10.0.0.1" matches IPv4 ranges */
function normalizeAddress(address: string): string {
  const lower = address.toLowerCase();
  if (lower.startsWith(IPV4_MAPPED_PREFIX) && isIP(lower.slice(IPV4_MAPPED_PREFIX.length)) === 4) {
    return lower.slice(IPV4_MAPPED_PREFIX.length);
  }
  return address;
}

function firstForwardedHop(forwardedFor: string | string[] | undefined): string | null {
  const header = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor;
  if (!header) return null;

  const firstHop = header.split(',')[0].trim();
  if (!firstHop || isIP(firstHop) === 0) return null;
  return firstHop;
}

export function createProxyIdentityResolver(trustedCidrs: string[]): ProxyIdentityResolver {
  const ranges = trustedCidrs.map((value) => value.trim()).filter((value) => value.length > 0);
  const trusted = new BlockList();
  for (const range of ranges) {
    const parsed = parseCidr(range);
    trusted.addSubnet(parsed.network, parsed.prefix, parsed.family);
  }

  const isTrustedPeer = (peer: string): boolean => {
    if (ranges.length === 0) return false;
    const address = normalizeAddress(peer);
    const version = isIP(address);
    if (version === 0) return false;
    return trusted.check(address, version === 4 ? 'ipv4' : 'ipv6');
  };

  return {
    resolve(peerAddress, forwardedFor) {
      const peer = peerAddress || UNKNOWN_PEER;
      if (!isTrustedPeer(peer)) {
        return { ip: peer };
      }
      return { ip: firstForwardedHop(forwardedFor) ?? peer };
    },
  };
}
