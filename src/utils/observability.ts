/**
 * Observability Recorder
 *
 * Turns the outcome of every request (gatekeeper rejection, handler
 * response, router miss) into one structured log line and one metric
 * observation. Label values never come straight from the request:
 * - method: known verb or OTHER
 * - route: matched template, else the statically resolved template, else _unmatched
 * - status_class: 1xx..5xx, else unknown
 */

import { GatekeeperMetrics } from '../config/metrics';
import {
  GuardErrorKind,
  GuardStage,
  METRIC_METHODS,
  MetricLabelSet,
  MetricMethod,
  RateLimitDecision,
  StatusClass,
} from '../types/gatekeeper';
import { RouteRegistry } from './routes';

export const UNMATCHED_ROUTE = '_unmatched';
export const MAX_ROUTE_LABEL_LENGTH = 96;
export const MAX_LOGGED_PATH_LENGTH = 128;

const KNOWN_METHODS: ReadonlySet<string> = new Set(METRIC_METHODS);

function isMetricMethod(value: string): value is (typeof METRIC_METHODS)[number] {
  return KNOWN_METHODS.has(value);
}

export function methodLabel(method: string): MetricMethod {
  const upper = method.toUpperCase();
  return isMetricMethod(upper) ? upper : 'OTHER';
}

export function statusClassLabel(statusCode: number): StatusClass {
  if (!Number.isInteger(statusCode) || statusCode < 100 || statusCode > 599) {
    return 'unknown';
  }
  switch (Math.floor(statusCode / 100)) {
    case 1:
      return '1xx';
    case 2:
      return '2xx';
    case 3:
      return '3xx';
    case 4:
      return '4xx';
    default:
      return '5xx';
  }
}

export function truncate(value: string, maxLength: number): string {
  return value.length > maxLength ? value.slice(0, maxLength) : value;
}

export function routeLabel(
  registry: RouteRegistry,
  matchedTemplate: string | null | undefined,
  method: string,
  path: string
): string {
  const template = matchedTemplate || registry.resolve(method, path) || UNMATCHED_ROUTE;
  return truncate(template, MAX_ROUTE_LABEL_LENGTH);
}

/** Fastify's request logger and the standalone pino logger both fit */
export interface RecordLogger {
  info(obj: object, msg: string): void;
  warn(obj: object, msg: string): void;
  error(obj: object, msg: string): void;
}

export interface RequestRecord {
  requestId: string;
  method: string;
  path: string;
  matchedTemplate: string | null;
  clientIp: string;
  stage: GuardStage;
  statusCode: number;
  errorKind?: GuardErrorKind;
  subject?: string;
  durationMs: number;
}

export interface RequestLogPayload {
  request_id: string;
  method: string;
  path: string;
  route: string;
  stage: GuardStage;
  status_code: number;
  duration_ms: number;
  client_ip: string;
  error_kind?: GuardErrorKind;
  subject?: string;
}

export class ObservabilityRecorder {
  constructor(
    private readonly metrics: GatekeeperMetrics,
    private readonly routes: RouteRegistry
  ) {}

  labelsFor(record: Pick<RequestRecord, 'method' | 'path' | 'matchedTemplate' | 'statusCode'>): MetricLabelSet {
    return {
      method: methodLabel(record.method),
      route: routeLabel(this.routes, record.matchedTemplate, record.method, record.path),
      status_class: statusClassLabel(record.statusCode),
    };
  }

  buildLogPayload(record: RequestRecord, route: string): RequestLogPayload {
    const payload: RequestLogPayload = {
      request_id: record.requestId,
      method: truncate(record.method, 16),
      path: truncate(record.path.split('?', 1)[0], MAX_LOGGED_PATH_LENGTH),
      route,
      stage: record.stage,
      status_code: record.statusCode,
      duration_ms: Math.round(record.durationMs * 100) / 100,
      client_ip: record.clientIp,
    };
    if (record.errorKind) payload.error_kind = record.errorKind;
    if (record.subject) payload.subject = record.subject;
    return payload;
  }

  record(record: RequestRecord, log: RecordLogger): MetricLabelSet {
    const labels = this.labelsFor(record);

    this.metrics.requestsTotal.inc(labels);
    this.metrics.requestDuration.observe(
      { method: labels.method, route: labels.route },
      record.durationMs / 1000
    );
    if (record.stage !== 'HANDLER' && record.errorKind) {
      this.metrics.rejectionsTotal.inc({ stage: record.stage, reason: record.errorKind });
    }

    const payload = this.buildLogPayload(record, labels.route);
    if (record.statusCode >= 500) {
      log.error(payload, 'request_failed');
    } else if (record.statusCode >= 400) {
      log.warn(payload, 'request_failed');
    } else {
      log.info(payload, 'request_completed');
    }

    return labels;
  }

  recordDegraded(decision: RateLimitDecision): void {
    this.metrics.rateLimitDegradedTotal.inc({ mode: decision.allowed ? 'fail_open' : 'fail_closed' });
  }
}
