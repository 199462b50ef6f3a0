/**
 * Payload Guard
 *
 * Reads a request body chunk by chunk with a running byte count and stops
 * as soon as the count passes the configured ceiling. A declared
 * Content-Length above the ceiling is rejected before any byte is read.
 *
 * On abort the source iterator is simply not advanced again: calling
 * return() on an IncomingMessage iterator destroys the socket, and the 413
 * could not be written. Node discards the unread remainder once the
 * response has finished.
 */

import { BadRequestError, GatekeeperError, PayloadTooLargeError } from './errors';

/** Methods with create/update/delete semantics */
export const GUARDED_METHODS: ReadonlySet<string> = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

export type BodyChunk = Buffer | Uint8Array | string;

export type PayloadResult =
  | { ok: true; body: Buffer | null }
  | { ok: false; error: GatekeeperError };

export interface PayloadGuard {
  readonly maxBytes: number;
  guard(
    method: string,
    contentLength: string | undefined,
    body: AsyncIterable<BodyChunk> | undefined
  ): Promise<PayloadResult>;
}

function chunkToBuffer(chunk: BodyChunk): Buffer {
  return typeof chunk === 'string' ? Buffer.from(chunk) : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
}

/** Returns null when no header was sent, NaN when it is malformed */
function parseContentLength(raw: string | undefined): number | null {
  const value = (raw ?? '').trim();
  if (!value) return null;
  if (!/^\d+$/.test(value)) return Number.NaN;
  return Number(value);
}

export function createPayloadGuard(maxBytes: number): PayloadGuard {
  return {
    maxBytes,

    async guard(method, contentLengthHeader, body) {
      if (!GUARDED_METHODS.has(method.toUpperCase())) {
        return { ok: true, body: null };
      }

      const contentLength = parseContentLength(contentLengthHeader);
      if (contentLength !== null && Number.isNaN(contentLength)) {
        return { ok: false, error: new BadRequestError('Invalid Content-Length header') };
      }
      if (contentLength !== null && contentLength > maxBytes) {
        return {
          ok: false,
          error: new PayloadTooLargeError({
            max_request_body_bytes: maxBytes,
            content_length: contentLength,
          }),
        };
      }

      if (!body) {
        return { ok: true, body: Buffer.alloc(0) };
      }

      const chunks: Buffer[] = [];
      let receivedBytes = 0;
      const iterator = body[Symbol.asyncIterator]();

      for (;;) {
        const next = await iterator.next();
        if (next.done) break;

        const chunk = chunkToBuffer(next.value);
        receivedBytes += chunk.byteLength;
        if (receivedBytes > maxBytes) {
          const details: Record<string, unknown> = {
            max_request_body_bytes: maxBytes,
            request_body_bytes: receivedBytes,
          };
          if (contentLength !== null) {
            details.content_length = contentLength;
          }
          return { ok: false, error: new PayloadTooLargeError(details) };
        }
        chunks.push(chunk);
      }

      return { ok: true, body: Buffer.concat(chunks, receivedBytes) };
    },
  };
}
