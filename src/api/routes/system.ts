/**
 * System routes: liveness, readiness and the Prometheus scrape endpoint.
 * Not behind the gatekeeper.
 */

import { FastifyPluginAsyncTypebox } from '@fastify/type-provider-typebox';
import { GatekeeperMetrics } from '../../config/metrics';
import { EventStore } from '../../types/event';
import { RateLimiter } from '../../utils/ratelimit';
import { HealthResponseSchema, ReadinessResponse, ReadinessResponseSchema } from '../schemas';

export interface SystemRoutesOptions {
  store: EventStore;
  rateLimiter: RateLimiter;
  metrics: GatekeeperMetrics;
}

export const systemRoutes: FastifyPluginAsyncTypebox<SystemRoutesOptions> = async (
  app,
  { store, rateLimiter, metrics }
) => {
  app.get('/', async (_request, reply) => {
    return reply.type('text/plain').send('API Server Available');
  });

  const live = async () => ({ status: 'ok' as const });

  app.get('/health', { schema: { response: { 200: HealthResponseSchema } } }, live);
  app.get('/health/live', { schema: { response: { 200: HealthResponseSchema } } }, live);

  /**
   * GET /health/ready - store and rate-limit backend checks; 503 when either fails
   */
  app.get(
    '/health/ready',
    {
      schema: {
        response: {
          200: ReadinessResponseSchema,
          503: ReadinessResponseSchema,
        },
      },
    },
    async (_request, reply) => {
      const [storeHealth, rateLimitHealth] = await Promise.all([store.checkHealth(), rateLimiter.checkHealth()]);
      const healthy = storeHealth.ok && rateLimitHealth.ok;

      const payload: ReadinessResponse = {
        status: healthy ? 'ok' : 'degraded',
        checks: {
          store: storeHealth,
          rate_limit_backend: rateLimitHealth,
        },
      };

      return reply.status(healthy ? 200 : 503).send(payload);
    }
  );

  app.get('/metrics', async (_request, reply) => {
    const body = await metrics.registry.metrics();
    return reply.type(metrics.registry.contentType).send(body);
  });
};
