import { z } from 'zod';
import { EVM_CHAINS } from '../../types/chain.js';
import type { RedisClient } from '../../infra/redis.js';
import type { Logger } from '../../infra/logger.js';
import type { PriceInfo } from '../../types/price.js';
import type { ResolvedChain } from '../../types/chain.js';

const cachedPriceSchema = z.object({
  address: z.string(),
  chain: z.enum(['solana', ...EVM_CHAINS]),
  priceUsd: z.number().nullable(),
  marketCap: z.number().nullable(),
  symbol: z.string().nullable(),
  name: z.string().nullable(),
  liquidityUsd: z.number().nullable(),
  dexUrl: z.string().nullable(),
});

export interface PriceCache {
  get(address: string, chain: ResolvedChain): Promise<PriceInfo | null>;
  set(address: string, chain: ResolvedChain, info: PriceInfo): Promise<void>;
}

export function priceCacheKey(address: string, chain: ResolvedChain): string {
  return `price:${chain}:${address}`;
}

/**
 * Short-lived lookup cache. Redis trouble is logged and the lookup proceeds
 * as a miss.
 */
export class RedisPriceCache implements PriceCache {
  constructor(
    private readonly redis: RedisClient,
    private readonly logger: Logger,
    private readonly ttlSeconds: number,
  ) {}

  async get(address: string, chain: ResolvedChain): Promise<PriceInfo | null> {
    const key = priceCacheKey(address, chain);
    try {
      const raw = await this.redis.get(key);
      if (raw === null) return null;

      const parsed = cachedPriceSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        this.logger.warn({ key }, 'Discarding malformed cached price');
        return null;
      }
      return parsed.data;
    } catch (err) {
      this.logger.warn({ err, key }, 'Price cache read failed');
      return null;
    }
  }

  async set(address: string, chain: ResolvedChain, info: PriceInfo): Promise<void> {
    if (this.ttlSeconds <= 0) return;

    const key = priceCacheKey(address, chain);
    try {
      await this.redis.set(key, JSON.stringify(info), 'EX', this.ttlSeconds);
    } catch (err) {
      this.logger.warn({ err, key }, 'Price cache write failed');
    }
  }
}
