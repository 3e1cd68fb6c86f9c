import Fastify, { FastifyInstance, FastifyError } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import { denyCategory } from '../filter/index.js';
import type { DenyReason, IntrospectionFilter } from '../filter/index.js';

export interface GatewayServerDeps {
  config: Config;
  filter: IntrospectionFilter;
  logger: Logger;
}

export interface Rejection {
  statusCode: number;
  headers: Record<string, string>;
  body: { error: string };
}

/**
 * Map a denial to the response sent in place of the upstream's.
 * Security denials become a Bearer challenge, anything else a server error.
 */
export function rejectionFor(reason: DenyReason, realm: string): Rejection {
  if (denyCategory(reason) === 'security') {
    return {
      statusCode: 401,
      headers: { 'www-authenticate': `Bearer realm="${realm}"` },
      body: { error: 'Unauthorized' },
    };
  }

  return { statusCode: 500, headers: {}, body: { error: 'Internal Server Error' } };
}

export async function createGatewayServer(deps: GatewayServerDeps): Promise<FastifyInstance> {
  const { config, filter, logger } = deps;

  const app = Fastify({
    logger: false, // We use our own logger
    bodyLimit: 1048576, // 1MB max request body
  });

  if (config.rate_limit.enabled) {
    await app.register(rateLimit, {
      max: config.rate_limit.max,
      timeWindow: config.rate_limit.time_window_ms,
    });
  }

  app.decorate('config', config);
  app.decorate('introspectionFilter', filter);
  app.decorate('gatewayLogger', logger);

  app.addHook('onRequest', async (request) => {
    logger.debug({ method: request.method, url: request.url }, 'Incoming request');
  });

  // Token check runs before the body is read
  app.addHook('onRequest', async (request, reply) => {
    if (request.routeOptions.config.public) {
      return;
    }

    const outcome = await filter.evaluate(request.headers);
    if (outcome.decision === 'allow') {
      return;
    }

    const rejection = rejectionFor(outcome.reason, config.gateway.realm);
    return reply.code(rejection.statusCode).headers(rejection.headers).send(rejection.body);
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    logger.error(
      {
        err: error,
        method: request.method,
        url: request.url,
      },
      'Request error'
    );

    // Don't expose internal errors to clients
    reply.code(error.statusCode || 500).send({
      error: error.statusCode ? error.message : 'Internal Server Error',
    });
  });

  app.get('/health', { config: { public: true } }, async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      cache: filter.cache.stats(),
    };
  });

  await app.register(import('./routes/passthrough.js'));

  return app;
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    introspectionFilter: IntrospectionFilter;
    gatewayLogger: Logger;
  }

  interface FastifyContextConfig {
    /** Served by the gateway itself, without a token check */
    public?: boolean;
  }
}
