import type { FastifyInstance } from 'fastify';
import type { Container } from '../../infra/container.js';
import type { TradeIngestionService } from '../../modules/trade-ingestion/index.js';
import { postMessageSchema } from '../schemas.js';

export async function messageRoutes(
  app: FastifyInstance,
  container: Container,
  ingestion: TradeIngestionService,
): Promise<void> {
  app.post('/messages', async (request, reply) => {
    const parsed = postMessageSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({
        error: 'Validation failed',
        details: parsed.error.format(),
      });
    }

    const { sender, text } = parsed.data;
    const allowed = container.settings.authorizedSenders;
    if (allowed.length > 0 && !allowed.includes(sender)) {
      container.logger.warn({ sender }, 'Message from unauthorized sender ignored');
      return reply.status(403).send({ error: 'Sender not authorized' });
    }

    const replyText = await ingestion.handle(text);
    return reply.send({ reply: replyText });
  });
}
