import type { FastifyInstance } from 'fastify';
import type { Container } from '../../infra/container.js';
import { detectChain, isEvmChain } from '../../modules/chain-detector/index.js';
import { createWalletSchema } from '../schemas.js';

export async function walletRoutes(app: FastifyInstance, container: Container): Promise<void> {
  app.post('/wallets', async (request, reply) => {
    const parsed = createWalletSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({
        error: 'Validation failed',
        details: parsed.error.format(),
      });
    }

    const { db } = container;
    const input = parsed.data;

    const guess = detectChain(input.address);
    let chain: string;
    if (guess.kind === 'evm-like') {
      if (input.chain && input.chain !== 'evm-like' && !isEvmChain(input.chain)) {
        return reply.status(400).send({ error: `An EVM address cannot belong to ${input.chain}` });
      }
      chain = input.chain ?? 'evm-like';
    } else if (guess.kind === 'solana') {
      if (input.chain && input.chain !== 'solana') {
        return reply.status(400).send({ error: `A Solana address cannot belong to ${input.chain}` });
      }
      chain = 'solana';
    } else {
      return reply.status(400).send({ error: 'Not an EVM or Solana address' });
    }

    const existing = db.findOwnedWallet(input.address, chain);
    const nickname = input.nickname ?? existing?.nickname ?? null;
    if (nickname) {
      const holder = db.findWalletByNickname(nickname);
      if (holder && holder.id !== existing?.id) {
        return reply.status(409).send({ error: 'Nickname already in use', wallet: holder });
      }
    }

    const wallet = db.saveWallet(input.address, chain, nickname);

    container.logger.info(
      { walletId: wallet.id, walletAddress: wallet.address, chain: wallet.chain, nickname: wallet.nickname },
      'Wallet registered',
    );

    return reply.status(existing ? 200 : 201).send(wallet);
  });

  app.get('/wallets', async (_request, reply) => {
    return reply.send(container.db.listWallets());
  });
}
