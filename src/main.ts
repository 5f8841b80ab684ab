import { env } from './config/env.js';
import { createLogger, createRedisClient, createJournalStore } from './infra/index.js';
import type { Container } from './infra/container.js';
import type { RedisClient } from './infra/redis.js';
import { EventBus } from './services/event-bus.js';
import { PriceEnrichmentService, RedisPriceCache } from './modules/price-enrichment/index.js';
import { PositionTracker } from './modules/position-tracker/index.js';
import { TradeIngestionService } from './modules/trade-ingestion/index.js';
import { JournalMetrics } from './modules/journal-metrics/index.js';
import { createServer } from './api/server.js';

async function main(): Promise<void> {
  const logger = createLogger({ LOG_LEVEL: env.LOG_LEVEL, NODE_ENV: env.NODE_ENV });
  logger.info('Trade journal starting');

  // Infrastructure
  const db = createJournalStore(env.DATABASE_PATH, logger);

  let redis: RedisClient | null = null;
  if (env.REDIS_URL) {
    redis = createRedisClient(env.REDIS_URL, logger);
    try {
      await redis.connect();
    } catch (err) {
      // Price cache only; lookups go straight to the API without it
      logger.warn({ err }, 'Redis unavailable, price cache disabled');
      redis.disconnect();
      redis = null;
    }
  } else {
    logger.info('REDIS_URL not set, price cache disabled');
  }

  const container: Container = {
    logger,
    db,
    redis,
    settings: {
      priceApiBaseUrl: env.PRICE_API_BASE_URL,
      priceLookupTimeoutMs: env.PRICE_LOOKUP_TIMEOUT_MS,
      priceCacheTtlSeconds: env.PRICE_CACHE_TTL_SECONDS,
      positionUpdateMaxRetries: env.POSITION_UPDATE_MAX_RETRIES,
      oversellTolerance: env.OVERSELL_TOLERANCE,
      authorizedSenders: env.AUTHORIZED_SENDERS,
    },
  };

  // Core services
  const eventBus = new EventBus(logger);
  const metrics = new JournalMetrics(container, eventBus);
  const prices = new PriceEnrichmentService(container, {
    cache: redis ? new RedisPriceCache(redis, logger, env.PRICE_CACHE_TTL_SECONDS) : undefined,
  });
  const tracker = new PositionTracker(container, eventBus);
  const ingestion = new TradeIngestionService(container, eventBus, prices, tracker);

  metrics.start();

  // API server
  const server = await createServer({ container, ingestion, metrics });
  await server.listen({ host: env.API_HOST, port: env.API_PORT });
  logger.info({ host: env.API_HOST, port: env.API_PORT }, 'API server listening');

  if (env.AUTHORIZED_SENDERS.length === 0) {
    logger.warn('AUTHORIZED_SENDERS is empty, any sender may post trades');
  } else {
    logger.info({ senders: env.AUTHORIZED_SENDERS.length }, 'Message senders restricted');
  }

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutdown signal received');

    await server.close();
    metrics.stop();
    eventBus.removeAllListeners();

    redis?.disconnect();
    db.close();

    logger.info('Trade journal shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => { shutdown('SIGTERM').catch(() => process.exit(1)); });
  process.on('SIGINT', () => { shutdown('SIGINT').catch(() => process.exit(1)); });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  process.on('uncaughtException', (err) => {
    logger.fatal({ err }, 'Uncaught exception');
    process.exit(1);
  });

  logger.info('Trade journal fully operational');
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal startup error:', err);
  process.exit(1);
});
