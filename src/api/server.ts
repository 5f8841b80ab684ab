import Fastify, { type FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import type { Container } from '../infra/container.js';
import type { TradeIngestionService } from '../modules/trade-ingestion/index.js';
import type { JournalMetrics } from '../modules/journal-metrics/index.js';
import { isJournalError } from '../services/errors.js';
import { healthRoutes } from './routes/health.js';
import { messageRoutes } from './routes/messages.js';
import { positionRoutes } from './routes/positions.js';
import { tradeRoutes } from './routes/trades.js';
import { walletRoutes } from './routes/wallets.js';
import { metricsRoutes } from './routes/metrics.js';

export interface ServerDeps {
  container: Container;
  ingestion: TradeIngestionService;
  metrics: JournalMetrics;
  /** Requests per minute per client; defaults to 100. */
  rateLimitMax?: number;
}

export async function createServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { container, ingestion, metrics } = deps;

  const app = Fastify({
    logger: false, // We use our own Pino instance
    requestTimeout: 30_000,
    bodyLimit: 65_536,
  });

  // Rate limiting
  await app.register(rateLimit, {
    max: deps.rateLimitMax ?? 100,
    timeWindow: '1 minute',
  });

  // Request logging
  app.addHook('onRequest', async (request) => {
    container.logger.debug(
      { method: request.method, url: request.url },
      'Incoming request',
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    container.logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed',
    );
  });

  // Error handler
  app.setErrorHandler((error: Error & { statusCode?: number }, _request, reply) => {
    container.logger.error({ err: error }, 'Unhandled route error');
    const statusCode = error.statusCode ?? 500;
    return reply.status(statusCode).send({
      error: error.message,
      ...(isJournalError(error) ? { code: error.code } : {}),
      statusCode,
    });
  });

  // Register routes
  await healthRoutes(app, container);
  await messageRoutes(app, container, ingestion);
  await positionRoutes(app, container);
  await tradeRoutes(app, container);
  await walletRoutes(app, container);
  await metricsRoutes(app, container, metrics);

  return app;
}
