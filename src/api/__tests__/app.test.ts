import { afterEach, describe, expect, it, vi } from 'vitest';
import { createMetrics } from '../../config/metrics';
import { loadConfig } from '../../config/env';
import { RateLimitBackend } from '../../utils/ratelimit';
import { signAccessToken } from '../../utils/tokens';
import { App, AppDeps, buildApp } from '../app';

const NOW_MS = Date.UTC(2026, 0, 1, 0, 0, 30);
const NOW_S = Math.floor(NOW_MS / 1000);
const JWT_SECRET = 'test-secret-test-secret-test-secret';

const apps: App[] = [];

afterEach(async () => {
  await Promise.all(apps.splice(0).map((app) => app.close()));
});

function createApp(env: NodeJS.ProcessEnv = {}, deps: Partial<AppDeps> = {}) {
  const metrics = deps.metrics ?? createMetrics();
  const app = buildApp(loadConfig({ LOG_LEVEL: 'silent', ...env }), {
    logger: false,
    clock: () => NOW_MS,
    metrics,
    ...deps,
  });
  apps.push(app);
  return { app, metrics };
}

function usageEvent(transactionId: string) {
  return {
    transaction_id: transactionId,
    customer_id: 'cust_1',
    event_type: 'api_call',
    timestamp: NOW_MS,
    properties: { endpoint: '/orders' },
  };
}

describe('rate limiting', () => {
  it('admits the limit per window and rejects the next request with 429', async () => {
    const { app } = createApp({ RATE_LIMIT_PER_MINUTE: '3' });

    const statuses: number[] = [];
    for (let i = 0; i < 3; i++) {
      const res = await app.inject({ method: 'POST', url: '/v1/echo', payload: { n: i } });
      statuses.push(res.statusCode);
    }
    const limited = await app.inject({
      method: 'POST',
      url: '/v1/echo',
      payload: { n: 3 },
      headers: { 'x-request-id': 'req-limited' },
    });

    expect(statuses).toEqual([200, 200, 200]);
    expect(limited.statusCode).toBe(429);
    expect(limited.headers['retry-after']).toBe('30');
    expect(limited.headers['x-ratelimit-limit']).toBe('3');
    expect(limited.headers['x-ratelimit-remaining']).toBe('0');
    expect(limited.json()).toEqual({
      code: 'RATE_LIMITED',
      message: 'Too Many Requests',
      error: 'Too Many Requests',
      request_id: 'req-limited',
      details: { retry_after_seconds: 30 },
    });
  });

  it('does not rate limit system routes', async () => {
    const { app } = createApp({ RATE_LIMIT_PER_MINUTE: '1' });
    const first = await app.inject({ method: 'GET', url: '/health' });
    const second = await app.inject({ method: 'GET', url: '/health' });
    expect([first.statusCode, second.statusCode]).toEqual([200, 200]);
  });

  it('fails closed while a remote backend is unavailable', async () => {
    const broken: RateLimitBackend = {
      name: 'redis',
      remote: true,
      incrementAndCount: async () => {
        throw new Error('connection refused');
      },
      checkHealth: async () => ({ ok: false, detail: 'connection refused' }),
    };
    const { app, metrics } = createApp(
      { RATE_LIMIT_PER_MINUTE: '10', RATE_LIMIT_FAIL_OPEN: 'false' },
      { rateLimitBackend: broken }
    );

    const res = await app.inject({ method: 'GET', url: '/v1/events' });
    expect(res.statusCode).toBe(429);

    const ready = await app.inject({ method: 'GET', url: '/health/ready' });
    expect(ready.statusCode).toBe(503);
    expect(ready.json()).toEqual({
      status: 'degraded',
      checks: {
        store: { ok: true, detail: '0 events' },
        rate_limit_backend: { ok: false, detail: 'connection refused' },
      },
    });

    const { values } = await metrics.rateLimitDegradedTotal.get();
    expect(values[0].labels).toEqual({ mode: 'fail_closed' });
  });
});

describe('payload guard', () => {
  it('rejects an oversized body with the uniform error shape', async () => {
    const { app } = createApp({ MAX_REQUEST_BODY_BYTES: '64' });

    const res = await app.inject({
      method: 'POST',
      url: '/v1/echo',
      headers: { 'content-type': 'application/json', 'x-request-id': 'req-413' },
      payload: JSON.stringify({ data: 'x'.repeat(100) }),
    });

    expect(res.statusCode).toBe(413);
    expect(res.headers['x-request-id']).toBe('req-413');
    expect(res.json()).toEqual({
      code: 'PAYLOAD_TOO_LARGE',
      message: 'Payload Too Large',
      error: 'Payload Too Large',
      request_id: 'req-413',
      details: { max_request_body_bytes: 64, content_length: 111 },
    });
  });

  it('records the rejection under the route template', async () => {
    const { app } = createApp({ MAX_REQUEST_BODY_BYTES: '64' });

    await app.inject({
      method: 'POST',
      url: '/v1/echo',
      headers: { 'content-type': 'application/json' },
      payload: JSON.stringify({ data: 'x'.repeat(100) }),
    });
    const scrape = await app.inject({ method: 'GET', url: '/metrics' });

    expect(scrape.statusCode).toBe(200);
    expect(scrape.body).toContain(
      'ingest_http_requests_total{method="POST",route="/v1/echo",status_class="4xx"} 1'
    );
    expect(scrape.body).toContain('ingest_gatekeeper_rejections_total{stage="PAYLOAD",reason="PAYLOAD_TOO_LARGE"} 1');
  });

  it('hands an admitted body on to the route unchanged', async () => {
    const { app } = createApp({ MAX_REQUEST_BODY_BYTES: '64' });
    const res = await app.inject({ method: 'POST', url: '/v1/echo', payload: { hello: 'world' } });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ you_sent: { hello: 'world' } });
  });

  it('rejects an echo body that is not a JSON object', async () => {
    const { app } = createApp();
    const res = await app.inject({ method: 'POST', url: '/v1/echo', payload: [1, 2, 3] });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: 'VALIDATION_ERROR' });
  });

  it('registers the echo route without schema deprecation warnings', async () => {
    const emitWarning = vi.spyOn(process, 'emitWarning');
    try {
      const { app } = createApp();
      await app.ready();
      expect(JSON.stringify(emitWarning.mock.calls)).not.toContain('FSTDEP');
    } finally {
      emitWarning.mockRestore();
    }
  });
});

describe('authentication', () => {
  const jwtEnv = { REQUIRE_JWT: 'true', JWT_SECRET };

  const token = (options: { scopes?: string[]; roles?: string[] }) =>
    signAccessToken({ secret: JWT_SECRET, subject: 'alice', issuedAt: NOW_S, ...options });

  it('rejects a request without a bearer token', async () => {
    const { app } = createApp(jwtEnv);
    const res = await app.inject({ method: 'GET', url: '/v1/events' });
    expect(res.statusCode).toBe(401);
    expect(res.json()).toMatchObject({ code: 'UNAUTHORIZED', error: 'Unauthorized' });
  });

  it('authorizes by method scope', async () => {
    const { app } = createApp(jwtEnv);
    const readOnly = `Bearer ${await token({ scopes: ['ingest:read'] })}`;

    const list = await app.inject({ method: 'GET', url: '/v1/events', headers: { authorization: readOnly } });
    expect(list.statusCode).toBe(200);
    expect(list.json()).toEqual({ total: 0, items: [] });

    const write = await app.inject({
      method: 'POST',
      url: '/v1/events',
      headers: { authorization: readOnly },
      payload: { events: [usageEvent('tx_1')] },
    });
    expect(write.statusCode).toBe(403);
    expect(write.json()).toMatchObject({ code: 'FORBIDDEN', message: 'Forbidden' });
  });

  it('lets the admin role delete without the delete scope', async () => {
    const { app } = createApp(jwtEnv);
    const admin = `Bearer ${await token({ roles: ['admin'] })}`;

    const res = await app.inject({
      method: 'DELETE',
      url: '/v1/events/tx_missing',
      headers: { authorization: admin },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ deleted: false });
  });

  it('checks the API key when required', async () => {
    const { app } = createApp({ REQUIRE_API_KEY: '1', API_KEY: 'test-api-key' });

    const denied = await app.inject({ method: 'GET', url: '/v1/events', headers: { 'x-api-key': 'nope' } });
    const allowed = await app.inject({ method: 'GET', url: '/v1/events', headers: { 'x-api-key': 'test-api-key' } });
    expect([denied.statusCode, allowed.statusCode]).toEqual([401, 200]);
  });
});

describe('event routes', () => {
  it('upserts, reads and deletes events', async () => {
    const { app } = createApp();

    const created = await app.inject({
      method: 'POST',
      url: '/v1/events',
      payload: { events: [usageEvent('tx_1'), usageEvent('bad id')] },
    });
    expect(created.statusCode).toBe(201);
    expect(created.json()).toEqual({
      inserted: 1,
      updated: 0,
      failed: [{ transaction_id: 'bad id', reason: 'Invalid transaction_id format' }],
    });

    const again = await app.inject({ method: 'POST', url: '/v1/events', payload: { events: [usageEvent('tx_1')] } });
    expect(again.json()).toEqual({ inserted: 0, updated: 1, failed: [] });

    const fetched = await app.inject({ method: 'GET', url: '/v1/events/tx_1' });
    expect(fetched.json()).toEqual(usageEvent('tx_1'));

    const removed = await app.inject({ method: 'DELETE', url: '/v1/events/tx_1' });
    expect(removed.json()).toEqual({ deleted: true });

    const missing = await app.inject({ method: 'GET', url: '/v1/events/tx_1', headers: { 'x-request-id': 'req-404' } });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({
      code: 'NOT_FOUND',
      message: 'Event not found: tx_1',
      error: 'Not Found',
      request_id: 'req-404',
    });
  });

  it('renders schema failures as VALIDATION_ERROR', async () => {
    const { app } = createApp();
    const res = await app.inject({ method: 'POST', url: '/v1/events', payload: { events: [] } });

    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.code).toBe('VALIDATION_ERROR');
    expect(body.details[0].path).toBe('/events');
  });
});

describe('system routes and errors', () => {
  it('answers liveness and readiness', async () => {
    const { app } = createApp({ RATE_LIMIT_PER_MINUTE: '5' });

    const live = await app.inject({ method: 'GET', url: '/health/live' });
    expect(live.json()).toEqual({ status: 'ok' });

    const ready = await app.inject({ method: 'GET', url: '/health/ready' });
    expect(ready.statusCode).toBe(200);
    expect(ready.json()).toEqual({
      status: 'ok',
      checks: {
        store: { ok: true, detail: '0 events' },
        rate_limit_backend: { ok: true, detail: 'memory backend' },
      },
    });
  });

  it('renders unknown routes in the uniform shape and labels them _unmatched', async () => {
    const { app } = createApp();

    const res = await app.inject({ method: 'GET', url: '/wp-login.php', headers: { 'x-request-id': 'req-miss' } });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      code: 'NOT_FOUND',
      message: 'Not Found',
      error: 'Not Found',
      request_id: 'req-miss',
    });

    const scrape = await app.inject({ method: 'GET', url: '/metrics' });
    expect(scrape.body).toContain('ingest_http_requests_total{method="GET",route="_unmatched",status_class="4xx"} 1');
  });

  it('mints a request id when the client sends an unusable one', async () => {
    const { app } = createApp();
    const res = await app.inject({ method: 'GET', url: '/health', headers: { 'x-request-id': 'bad id with spaces' } });
    expect(res.headers['x-request-id']).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  });

  it('refuses hosts outside the allowlist', async () => {
    const { app } = createApp({ ALLOWED_HOSTS: 'api.example.test' });

    const denied = await app.inject({ method: 'GET', url: '/health' });
    expect(denied.statusCode).toBe(400);
    expect(denied.json()).toMatchObject({ code: 'BAD_REQUEST', message: 'Invalid host header' });

    const allowed = await app.inject({ method: 'GET', url: '/health', headers: { host: 'api.example.test:8080' } });
    expect(allowed.statusCode).toBe(200);
  });
});

describe('cors', () => {
  const splitHeader = (value: string | number | string[] | undefined) =>
    String(value ?? '')
      .split(',')
      .map((item) => item.trim());

  it('answers preflights with the configured methods and headers', async () => {
    const { app } = createApp({ CORS_ALLOW_METHODS: 'GET,PUT', CORS_ALLOW_HEADERS: 'x-api-key,authorization' });

    const res = await app.inject({
      method: 'OPTIONS',
      url: '/v1/events',
      headers: { origin: 'https://app.example.test', 'access-control-request-method': 'PUT' },
    });

    expect(res.statusCode).toBe(204);
    expect(res.headers['access-control-allow-origin']).toBe('*');
    expect(splitHeader(res.headers['access-control-allow-methods'])).toEqual(['GET', 'PUT']);
    expect(splitHeader(res.headers['access-control-allow-headers'])).toEqual(['x-api-key', 'authorization']);
  });

  it('reflects the requested headers under the wildcard default', async () => {
    const { app } = createApp();

    const res = await app.inject({
      method: 'OPTIONS',
      url: '/v1/events',
      headers: {
        origin: 'https://app.example.test',
        'access-control-request-method': 'POST',
        'access-control-request-headers': 'x-api-key',
      },
    });

    expect(res.statusCode).toBe(204);
    expect(splitHeader(res.headers['access-control-allow-methods'])).toEqual(['GET', 'POST', 'DELETE', 'OPTIONS']);
    expect(res.headers['access-control-allow-headers']).toBe('x-api-key');
  });
});
