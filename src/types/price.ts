import type { ChainId } from './chain.js';

export interface PriceInfo {
  address: string;
  chain: ChainId;
  priceUsd: number | null;
  marketCap: number | null;
  symbol: string | null;
  name: string | null;
  liquidityUsd: number | null;
  dexUrl: string | null;
}

export type PriceFailureReason = 'timeout' | 'network' | 'rate-limited' | 'bad-response';

export type PriceLookupResult =
  | { status: 'found'; info: PriceInfo; cached: boolean }
  | { status: 'not-found' }
  | { status: 'failed'; reason: PriceFailureReason; message: string };
