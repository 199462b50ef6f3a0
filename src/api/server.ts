/**
 * Ingest API entry point
 *
 * Loads configuration from the environment, builds the app and listens.
 * A configuration error stops the process before the port is bound.
 */

import { loadConfig } from '../config/env';
import { ConfigurationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { buildApp } from './app';

const start = async () => {
  const config = loadConfig();
  const app = buildApp(config);

  const shutdown = (signal: string) => {
    app.log.info({ signal }, 'Shutting down');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await app.listen({ port: config.port, host: config.host });
  app.log.info(
    {
      rate_limit_backend: config.rateLimit.backend,
      rate_limit_per_window: config.rateLimit.perMinute,
      require_api_key: config.auth.requireApiKey,
      require_jwt: config.auth.requireJwt,
      strict_security_mode: config.strictSecurityMode,
    },
    'Gatekeeper configured'
  );
};

start().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    logger.fatal({ reason: err.message }, 'Invalid configuration');
  } else {
    logger.fatal({ err }, 'Failed to start server');
  }
  process.exit(1);
});
