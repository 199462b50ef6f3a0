/**
 * Request Gatekeeper Types
 *
 * Shapes shared by the proxy resolver, payload guard, rate limiter,
 * authenticator and the observability recorder.
 */

/** Client identity resolved once per request */
export interface ClientIdentity {
  ip: string;
}

/** Claims extracted from a verified bearer token */
export interface JwtClaims {
  sub?: string;
  exp: number;
  aud?: string | string[];
  iss?: string;
  scopes: string[];
  roles: string[];
}

export type Credential =
  | { kind: 'api_key'; key: string }
  | { kind: 'jwt'; claims: JwtClaims };

export type RateLimitReason =
  | 'OK'
  | 'LIMIT_EXCEEDED'
  | 'BACKEND_DEGRADED_OPEN'
  | 'BACKEND_DEGRADED_CLOSED';

export interface RateLimitDecision {
  allowed: boolean;
  remainingWindowSeconds: number;
  reason: RateLimitReason;
  limit: number; // requests per window, 0 = disabled
  remaining: number;
}

export type GuardStage = 'PROXY' | 'PAYLOAD' | 'RATE_LIMIT' | 'AUTH' | 'HANDLER';

export type GuardErrorKind =
  | 'BAD_REQUEST'
  | 'PAYLOAD_TOO_LARGE'
  | 'RATE_LIMITED'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN';

/** Terminal result of one request, rendered as the response and recorded as metrics */
export interface GuardOutcome {
  stage: GuardStage;
  statusCode: number;
  errorKind?: GuardErrorKind;
}

export const METRIC_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'] as const;

export type MetricMethod = (typeof METRIC_METHODS)[number] | 'OTHER';

export type StatusClass = '1xx' | '2xx' | '3xx' | '4xx' | '5xx' | 'unknown';

export interface MetricLabelSet {
  method: MetricMethod;
  route: string;
  status_class: StatusClass;
}

export type RequestHeaders = Record<string, string | string[] | undefined>;
