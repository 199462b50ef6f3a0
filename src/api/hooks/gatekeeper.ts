/**
 * Gatekeeper Hook
 *
 * Fastify preParsing hook for protected routes. It runs before the body is
 * parsed so the payload guard sees the raw request stream; on admission the
 * fully received bytes are handed on to Fastify's body parser unchanged.
 * A rejection is thrown as its GatekeeperError and rendered by the app's
 * error handler.
 */

import { Readable } from 'stream';
import { FastifyReply, FastifyRequest, RequestPayload } from 'fastify';
import { ClientIdentity, Credential, GuardOutcome, RateLimitDecision } from '../../types/gatekeeper';
import { RateLimitedError } from '../../utils/errors';
import { Gatekeeper } from '../../utils/gatekeeper';

declare module 'fastify' {
  interface FastifyRequest {
    identity: ClientIdentity | null;
    guardOutcome: GuardOutcome | null;
    credentials: Credential[] | null;
  }
}

function setRateLimitHeaders(reply: FastifyReply, decision: RateLimitDecision): void {
  if (decision.limit <= 0) return;
  reply.header('X-RateLimit-Limit', String(decision.limit));
  reply.header('X-RateLimit-Remaining', String(decision.remaining));
  reply.header('X-RateLimit-Reset', String(decision.remainingWindowSeconds));
}

export function createGatekeeperHook(gatekeeper: Gatekeeper) {
  return async function gatekeeperHook(
    request: FastifyRequest,
    reply: FastifyReply,
    payload: RequestPayload
  ): Promise<RequestPayload> {
    const result = await gatekeeper.evaluate({
      requestId: request.id,
      method: request.method,
      path: request.url,
      peerAddress: request.socket.remoteAddress,
      headers: request.headers,
      body: payload,
    });

    request.identity = result.identity;
    request.guardOutcome = result.outcome;
    if (result.rateLimit) {
      setRateLimitHeaders(reply, result.rateLimit);
    }

    if (!result.admitted) {
      if (result.error instanceof RateLimitedError) {
        reply.header('Retry-After', String(result.error.retryAfterSeconds));
      }
      throw result.error;
    }

    request.credentials = result.credentials;
    if (result.body === null) {
      return payload;
    }
    return Readable.from([result.body], { objectMode: false });
  };
}
