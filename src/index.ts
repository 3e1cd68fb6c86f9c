import pino from 'pino';
import { loadConfig, buildFilterSettings } from './config/index.js';
import { createIntrospectionFilter } from './filter/index.js';
import { createGatewayServer } from './gateway/server.js';

const CONFIG_PATH = process.env.CONFIG_PATH || './config/gateway.yaml';

async function main() {
  const config = loadConfig(CONFIG_PATH);

  const usePrettyLogs = config.logging.format === 'pretty' && process.env.NODE_ENV !== 'production';
  const logger = pino({
    level: config.logging.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
    transport: usePrettyLogs ? { target: 'pino-pretty' } : undefined,
  });

  if (config.logging.format === 'pretty' && process.env.NODE_ENV === 'production') {
    logger.warn('Pretty logging is not available in production, using JSON format instead');
  }

  logger.info('Starting introspection gateway...');
  logger.info({ configPath: CONFIG_PATH }, 'Configuration loaded');

  const settings = buildFilterSettings(config);
  const filter = createIntrospectionFilter(settings, logger);
  logger.info(
    {
      endpoint: settings.client.endpoint,
      strategy: settings.strategy.type,
      header: settings.strategy.header,
      cacheMaxEntries: settings.cache.maxEntries,
      cacheDefaultTtlMs: settings.cache.defaultTtlMs,
    },
    'Introspection filter initialized'
  );

  const server = await createGatewayServer({ config, filter, logger });

  // Expired verdicts are never served, this only reclaims their memory
  const cleanupTimer = setInterval(() => {
    const deleted = filter.cache.cleanupExpired();
    if (deleted > 0) {
      logger.debug({ deleted }, 'Cleaned up expired verdicts');
    }
  }, config.cache.cleanup_interval_seconds * 1000);
  cleanupTimer.unref();

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');

    clearInterval(cleanupTimer);
    await server.close();
    logger.info('HTTP server closed');

    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });

  const { listen_port: port, host, upstream_url: upstreamUrl } = config.gateway;
  await server.listen({ port, host });

  logger.info({ port, upstreamUrl }, 'Gateway started');
}

process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled rejection at:', promise, 'reason:', reason);
});

main().catch((err) => {
  console.error('Failed to start:', err);
  process.exit(1);
});
