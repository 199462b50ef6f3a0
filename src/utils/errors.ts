/**
 * Gatekeeper Error Taxonomy
 *
 * ConfigurationError aborts startup. GatekeeperError subclasses are
 * per-request rejections rendered into the uniform error body by the
 * API error handler. BackendDegradedError never leaves the rate limiter.
 */

import { STATUS_CODES } from 'http';
import { GuardErrorKind } from '../types/gatekeeper';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export abstract class GatekeeperError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: GuardErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.details = details;
  }
}

export class BadRequestError extends GatekeeperError {
  readonly statusCode = 400;
  readonly code = 'BAD_REQUEST';

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'BadRequestError';
  }
}

export class CredentialError extends GatekeeperError {
  readonly statusCode: 401 | 403;
  readonly code: 'UNAUTHORIZED' | 'FORBIDDEN';

  private constructor(kind: 'UNAUTHORIZED' | 'FORBIDDEN', message: string) {
    super(message);
    this.name = 'CredentialError';
    this.code = kind;
    this.statusCode = kind === 'UNAUTHORIZED' ? 401 : 403;
  }

  static unauthorized(): CredentialError {
    return new CredentialError('UNAUTHORIZED', 'Unauthorized');
  }

  static forbidden(): CredentialError {
    return new CredentialError('FORBIDDEN', 'Forbidden');
  }
}

export class PayloadTooLargeError extends GatekeeperError {
  readonly statusCode = 413;
  readonly code = 'PAYLOAD_TOO_LARGE';

  constructor(details: Record<string, unknown>) {
    super('Payload Too Large', details);
    this.name = 'PayloadTooLargeError';
  }
}

export class RateLimitedError extends GatekeeperError {
  readonly statusCode = 429;
  readonly code = 'RATE_LIMITED';
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number) {
    super('Too Many Requests', { retry_after_seconds: retryAfterSeconds });
    this.name = 'RateLimitedError';
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/** Remote rate-limit store failed or timed out */
export class BackendDegradedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BackendDegradedError';
  }
}

export interface ErrorBody {
  code: string;
  message: string;
  error: string;
  request_id: string;
  details?: unknown;
}

export function buildErrorBody(params: {
  statusCode: number;
  code: string;
  message: string;
  requestId: string;
  details?: unknown;
}): ErrorBody {
  const body: ErrorBody = {
    code: params.code,
    message: params.message,
    error: STATUS_CODES[params.statusCode] ?? 'Error',
    request_id: params.requestId,
  };
  if (params.details !== undefined) {
    body.details = params.details;
  }
  return body;
}
