import Fastify, { FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import { v4 as uuidv4 } from 'uuid';
import { AppConfig } from '../config/env';
import { createMetrics, GatekeeperMetrics } from '../config/metrics';
import { createRedisClient, toCounterClient } from '../config/redis';
import { EventStore } from '../types/event';
import { createAuthenticator } from '../utils/auth';
import { Gatekeeper } from '../utils/gatekeeper';
import { ObservabilityRecorder } from '../utils/observability';
import { createPayloadGuard } from '../utils/payload';
import { createProxyIdentityResolver } from '../utils/proxy';
import {
  MemoryRateLimitBackend,
  RateLimitBackend,
  RateLimiter,
  RedisRateLimitBackend,
} from '../utils/ratelimit';
import { RouteRegistry } from '../utils/routes';
import { MemoryEventStore } from '../utils/storage';
import { errorHandler, notFoundHandler } from './errors';
import { createGatekeeperHook } from './hooks/gatekeeper';
import { createHostAllowlistHook } from './hooks/hosts';
import { createResponseRecorderHook, requestIdHook } from './hooks/observability';
import { eventRoutes } from './routes/events';
import { systemRoutes } from './routes/system';

export interface AppDeps {
  store: EventStore;
  rateLimitBackend: RateLimitBackend;
  metrics: GatekeeperMetrics;
  clock: () => number;
  logger: FastifyServerOptions['logger'];
}

const MAX_REQUEST_ID_LENGTH = 128;
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

/** Reuse a sane client-supplied X-Request-Id, otherwise mint one */
function genReqId(req: { headers: Record<string, string | string[] | undefined> }): string {
  const header = req.headers['x-request-id'];
  const value = Array.isArray(header) ? header[0] : header;
  if (value && value.length <= MAX_REQUEST_ID_LENGTH && REQUEST_ID_PATTERN.test(value)) {
    return value;
  }
  return uuidv4();
}

interface OwnedBackend {
  backend: RateLimitBackend;
  close?: () => Promise<void>;
}

function createRateLimitBackend(config: AppConfig): OwnedBackend {
  if (config.rateLimit.backend === 'memory' || config.rateLimit.perMinute <= 0) {
    return { backend: new MemoryRateLimitBackend() };
  }

  const redis = createRedisClient(config.rateLimit.redisUrl, config.rateLimit.timeoutMs);
  return {
    backend: new RedisRateLimitBackend(toCounterClient(redis), {
      keyPrefix: config.rateLimit.redisPrefix,
      timeoutMs: config.rateLimit.timeoutMs,
    }),
    close: async () => {
      redis.disconnect();
    },
  };
}

/**
 * Build the API: gatekeeper in front of the /v1 routes, observability on
 * everything. Invalid configuration throws ConfigurationError from here,
 * before anything listens.
 */
export function buildApp(config: AppConfig, deps: Partial<AppDeps> = {}) {
  const clock = deps.clock ?? Date.now;
  const store = deps.store ?? new MemoryEventStore();
  const metrics = deps.metrics ?? createMetrics({ defaultMetrics: true });
  const routes = new RouteRegistry();
  const recorder = new ObservabilityRecorder(metrics, routes);

  const proxy = createProxyIdentityResolver(config.trustedProxyCidrs);
  const authenticator = createAuthenticator(config.auth, clock);
  const limiterBackend: OwnedBackend = deps.rateLimitBackend ? { backend: deps.rateLimitBackend } : createRateLimitBackend(config);
  const rateLimiter = new RateLimiter(limiterBackend.backend, {
    limit: config.rateLimit.perMinute,
    windowSeconds: config.rateLimit.windowSeconds,
    cooldownSeconds: config.rateLimit.cooldownSeconds,
    failOpen: config.rateLimit.failOpen,
    clock,
    onDegraded: (decision) => recorder.recordDegraded(decision),
  });
  const gatekeeper = new Gatekeeper({
    proxy,
    payload: createPayloadGuard(config.maxRequestBodyBytes),
    rateLimiter,
    authenticator,
  });

  const app = Fastify({
    logger: deps.logger ?? { level: config.logLevel },
    disableRequestLogging: true,
    bodyLimit: config.maxRequestBodyBytes,
    requestIdHeader: false,
    genReqId,
  }).withTypeProvider<TypeBoxTypeProvider>();

  app.decorateRequest('identity', null);
  app.decorateRequest('guardOutcome', null);
  app.decorateRequest('credentials', null);

  // Declared templates feed metric labels for requests the router never matched
  app.addHook('onRoute', (route) => {
    const methods = Array.isArray(route.method) ? route.method : [route.method];
    for (const method of methods) {
      routes.register({ method, template: route.url });
    }
  });

  app.addHook('onRequest', requestIdHook);
  app.addHook('onRequest', createHostAllowlistHook(config.allowedHosts));
  app.addHook('onResponse', createResponseRecorderHook(recorder, gatekeeper));

  app.setErrorHandler(errorHandler);
  app.setNotFoundHandler(notFoundHandler);

  // no allowedHeaders means the preflight's requested headers are reflected
  app.register(cors, {
    origin: config.corsAllowOrigins.includes('*') ? '*' : config.corsAllowOrigins,
    methods: config.corsAllowMethods,
    allowedHeaders: config.corsAllowHeaders.includes('*') ? undefined : config.corsAllowHeaders,
  });

  app.register(systemRoutes, { store, rateLimiter, metrics });

  app.register(
    async (protectedScope) => {
      protectedScope.addHook('preParsing', createGatekeeperHook(gatekeeper));
      await protectedScope.register(eventRoutes, { store, clock });
    },
    { prefix: '/v1' }
  );

  const { close } = limiterBackend;
  if (close) {
    app.addHook('onClose', async () => {
      await close();
    });
  }

  return app;
}

export type App = ReturnType<typeof buildApp>;
