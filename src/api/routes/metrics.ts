import type { FastifyInstance } from 'fastify';
import type { Container } from '../../infra/container.js';
import type { JournalMetrics } from '../../modules/journal-metrics/index.js';

export async function metricsRoutes(
  app: FastifyInstance,
  container: Container,
  metrics: JournalMetrics,
): Promise<void> {
  app.get('/metrics', async (_request, reply) => {
    const stats = container.db.getTradingStats();

    return reply.send({
      timestamp: new Date().toISOString(),
      journal: stats,
      activity: metrics.snapshot(),
    });
  });
}
