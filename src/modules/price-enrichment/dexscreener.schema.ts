import { z } from 'zod';

// Only the fields the journal reads; DEX Screener sends many more.
const dexTokenSchema = z.object({
  address: z.string(),
  name: z.string().nullish(),
  symbol: z.string().nullish(),
});

export const dexPairSchema = z.object({
  chainId: z.string(),
  dexId: z.string().nullish(),
  url: z.string().nullish(),
  pairAddress: z.string(),
  baseToken: dexTokenSchema,
  quoteToken: dexTokenSchema,
  priceUsd: z.string().nullish(),
  liquidity: z.object({ usd: z.number().nullish() }).nullish(),
  fdv: z.number().nullish(),
  marketCap: z.number().nullish(),
});

export type DexPair = z.infer<typeof dexPairSchema>;

/** `/latest/dex/tokens/:address` */
export const tokenPairsResponseSchema = z.union([
  z.array(dexPairSchema),
  z.object({ pairs: z.array(dexPairSchema).nullish() }),
]);

/** `/latest/dex/pairs/:chain/:pairAddress` */
export const pairResponseSchema = z.object({
  pair: dexPairSchema.nullish(),
  pairs: z.array(dexPairSchema).nullish(),
});
