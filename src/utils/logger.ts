import pino, { Logger } from 'pino';

/**
 * Process-level logger for components that run outside a request
 * (rate-limit backends, startup). Request-scoped logs go through
 * Fastify's own pino instance instead.
 */
export const logger: Logger = pino({
  name: 'ingest-gatekeeper',
  level: process.env.LOG_LEVEL || 'info',
});

export type { Logger };
