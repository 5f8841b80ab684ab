import type { FastifyInstance } from 'fastify';
import type { Container } from '../../infra/container.js';
import { listTradesQuerySchema } from '../schemas.js';

export async function tradeRoutes(app: FastifyInstance, container: Container): Promise<void> {
  app.get('/trades', async (request, reply) => {
    const parsed = listTradesQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({
        error: 'Validation failed',
        details: parsed.error.format(),
      });
    }

    return reply.send(container.db.listRecentTrades(parsed.data.limit));
  });
}
