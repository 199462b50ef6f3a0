/**
 * Observability Hooks
 *
 * onRequest tags every response with X-Request-Id; onResponse hands the
 * finished request to the recorder. Requests that never entered the
 * gatekeeper (system routes, router misses, host rejections) are recorded
 * with stage HANDLER and their identity resolved here for the first time.
 */

import { FastifyReply, FastifyRequest } from 'fastify';
import { describeCredential } from '../../utils/auth';
import { Gatekeeper } from '../../utils/gatekeeper';
import { ObservabilityRecorder } from '../../utils/observability';

export async function requestIdHook(request: FastifyRequest, reply: FastifyReply): Promise<void> {
  reply.header('X-Request-Id', request.id);
}

export function createResponseRecorderHook(recorder: ObservabilityRecorder, gatekeeper: Gatekeeper) {
  return async function responseRecorderHook(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    const identity = request.identity ?? gatekeeper.resolveIdentity(request.socket.remoteAddress, request.headers);
    const outcome = request.guardOutcome;
    const rejected = outcome !== null && outcome.stage !== 'HANDLER';

    recorder.record(
      {
        requestId: request.id,
        method: request.method,
        path: request.url,
        matchedTemplate: request.is404 ? null : request.routeOptions.url ?? null,
        clientIp: identity.ip,
        stage: rejected ? outcome.stage : 'HANDLER',
        statusCode: reply.statusCode,
        errorKind: rejected ? outcome.errorKind : undefined,
        subject: request.credentials?.map(describeCredential).join(',') || undefined,
        durationMs: reply.elapsedTime,
      },
      request.log
    );
  };
}
