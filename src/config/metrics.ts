import { collectDefaultMetrics, Counter, Histogram, Registry } from 'prom-client';

/**
 * Prometheus metrics catalog
 *
 * Each app instance gets its own registry so tests and multiple apps in one
 * process never share counters. Every label here is bounded: see
 * utils/observability.ts for how values are normalized before use.
 */

export const METRIC_PREFIX = 'ingest_';

export interface GatekeeperMetrics {
  registry: Registry;
  requestsTotal: Counter<'method' | 'route' | 'status_class'>;
  requestDuration: Histogram<'method' | 'route'>;
  rejectionsTotal: Counter<'stage' | 'reason'>;
  rateLimitDegradedTotal: Counter<'mode'>;
}

export function createMetrics(options: { defaultMetrics?: boolean } = {}): GatekeeperMetrics {
  const registry = new Registry();

  if (options.defaultMetrics) {
    collectDefaultMetrics({ register: registry, prefix: METRIC_PREFIX });
  }

  return {
    registry,
    requestsTotal: new Counter({
      name: `${METRIC_PREFIX}http_requests_total`,
      help: 'Total HTTP requests',
      labelNames: ['method', 'route', 'status_class'] as const,
      registers: [registry],
    }),
    requestDuration: new Histogram({
      name: `${METRIC_PREFIX}http_request_duration_seconds`,
      help: 'HTTP request latency (seconds)',
      labelNames: ['method', 'route'] as const,
      buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
      registers: [registry],
    }),
    rejectionsTotal: new Counter({
      name: `${METRIC_PREFIX}gatekeeper_rejections_total`,
      help: 'Requests terminated by the gatekeeper, by stage and reason',
      labelNames: ['stage', 'reason'] as const,
      registers: [registry],
    }),
    rateLimitDegradedTotal: new Counter({
      name: `${METRIC_PREFIX}rate_limit_degraded_total`,
      help: 'Rate-limit decisions taken without the backend (fail_open / fail_closed)',
      labelNames: ['mode'] as const,
      registers: [registry],
    }),
  };
}
