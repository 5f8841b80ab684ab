import type { FastifyInstance } from 'fastify';
import type { Container } from '../../infra/container.js';

export async function healthRoutes(app: FastifyInstance, container: Container): Promise<void> {
  app.get('/health', async (_request, reply) => {
    try {
      container.db.ping();

      let redis: 'ok' | 'degraded' | 'disabled' = 'disabled';
      if (container.redis) {
        // The cache is optional; a dead Redis only degrades lookups
        try {
          redis = (await container.redis.ping()) === 'PONG' ? 'ok' : 'degraded';
        } catch (err) {
          container.logger.warn({ err }, 'Redis ping failed');
          redis = 'degraded';
        }
      }

      return reply.send({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        checks: {
          database: 'ok',
          redis,
        },
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      container.logger.error({ err }, 'Health check failed');
      return reply.status(503).send({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: message,
      });
    }
  });
}
