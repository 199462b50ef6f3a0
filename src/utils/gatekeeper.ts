/**
 * Request Gatekeeper
 *
 * Runs the fixed stage chain around every protected request:
 *
 *   PROXY -> PAYLOAD -> RATE_LIMIT -> AUTH -> HANDLER
 *
 * The proxy stage never rejects; it only decides the identity the later
 * stages and the logs use. Payload size is checked first so an oversized
 * body is refused without touching the rate-limit store or verifying a
 * token. Each stage returns a typed result; the first rejection ends the
 * chain with a GuardOutcome naming the stage that stopped it.
 */

import {
  ClientIdentity,
  Credential,
  GuardOutcome,
  GuardStage,
  RateLimitDecision,
  RequestHeaders,
} from '../types/gatekeeper';
import { Authenticator } from './auth';
import { GatekeeperError, RateLimitedError } from './errors';
import { BodyChunk, PayloadGuard } from './payload';
import { ProxyIdentityResolver } from './proxy';
import { RateLimiter } from './ratelimit';

export interface GatekeeperRequest {
  requestId: string;
  method: string;
  path: string;
  peerAddress: string | undefined;
  headers: RequestHeaders;
  body?: AsyncIterable<BodyChunk>;
}

export interface GatekeeperAdmit {
  admitted: true;
  identity: ClientIdentity;
  /** Fully received body for guarded methods, null when the body was not read */
  body: Buffer | null;
  credentials: Credential[];
  rateLimit: RateLimitDecision;
  outcome: GuardOutcome;
}

export interface GatekeeperReject {
  admitted: false;
  identity: ClientIdentity;
  error: GatekeeperError;
  rateLimit?: RateLimitDecision;
  outcome: GuardOutcome;
}

export type GatekeeperResult = GatekeeperAdmit | GatekeeperReject;

export interface GatekeeperDeps {
  proxy: ProxyIdentityResolver;
  payload: PayloadGuard;
  rateLimiter: RateLimiter;
  authenticator: Authenticator;
}

function firstHeader(headers: RequestHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function reject(
  stage: GuardStage,
  identity: ClientIdentity,
  error: GatekeeperError,
  rateLimit?: RateLimitDecision
): GatekeeperReject {
  return {
    admitted: false,
    identity,
    error,
    rateLimit,
    outcome: { stage, statusCode: error.statusCode, errorKind: error.code },
  };
}

export class Gatekeeper {
  constructor(private readonly deps: GatekeeperDeps) {}

  get rateLimiter(): RateLimiter {
    return this.deps.rateLimiter;
  }

  /** Identity resolution alone, for requests that never enter the chain */
  resolveIdentity(peerAddress: string | undefined, headers: RequestHeaders): ClientIdentity {
    return this.deps.proxy.resolve(peerAddress, headers['x-forwarded-for']);
  }

  async evaluate(request: GatekeeperRequest): Promise<GatekeeperResult> {
    const identity = this.resolveIdentity(request.peerAddress, request.headers);

    const payload = await this.deps.payload.guard(
      request.method,
      firstHeader(request.headers, 'content-length'),
      request.body
    );
    if (!payload.ok) {
      return reject('PAYLOAD', identity, payload.error);
    }

    const rateLimit = await this.deps.rateLimiter.check(identity.ip);
    if (!rateLimit.allowed) {
      return reject('RATE_LIMIT', identity, new RateLimitedError(rateLimit.remainingWindowSeconds), rateLimit);
    }

    const auth = await this.deps.authenticator.authenticate(request.method, request.headers);
    if (!auth.ok) {
      return reject('AUTH', identity, auth.error, rateLimit);
    }

    return {
      admitted: true,
      identity,
      body: payload.body,
      credentials: auth.credentials,
      rateLimit,
      outcome: { stage: 'HANDLER', statusCode: 200 },
    };
  }
}
