import type { FastifyInstance } from 'fastify';
import type { Container } from '../../infra/container.js';
import { averageCost } from '../../modules/position-tracker/index.js';
import { listPositionsQuerySchema, positionParamsSchema } from '../schemas.js';

export async function positionRoutes(app: FastifyInstance, container: Container): Promise<void> {
  app.get('/positions', async (request, reply) => {
    const parsed = listPositionsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({
        error: 'Validation failed',
        details: parsed.error.format(),
      });
    }

    const positions = container.db.listPositions(parsed.data.status);
    return reply.send(
      positions.map((position) => ({ ...position, averageCostUsd: averageCost(position) })),
    );
  });

  app.get('/positions/:id', async (request, reply) => {
    const parsed = positionParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.status(400).send({
        error: 'Validation failed',
        details: parsed.error.format(),
      });
    }

    const position = container.db.getPositionView(parsed.data.id);
    if (!position) {
      return reply.status(404).send({ error: 'Position not found' });
    }

    return reply.send({
      ...position,
      averageCostUsd: averageCost(position),
      trades: container.db.listTradesForPosition(position.id),
    });
  });
}
