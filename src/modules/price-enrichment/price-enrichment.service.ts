import type { z } from 'zod';
import { normalizeAddress, normalizeChainName } from '../chain-detector/index.js';
import { PriceLookupError } from '../../services/errors.js';
import { pairResponseSchema, tokenPairsResponseSchema } from './dexscreener.schema.js';
import type { DexPair } from './dexscreener.schema.js';
import type { PriceCache } from './price-cache.js';
import type { Container } from '../../infra/container.js';
import type { ChainId, ResolvedChain } from '../../types/chain.js';
import type { PriceInfo, PriceLookupResult } from '../../types/price.js';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface PriceEnrichmentDeps {
  fetchFn?: FetchFn;
  cache?: PriceCache | null;
}

// Lower wins when an address trades on several chains
const CHAIN_PRIORITY: Partial<Record<ChainId, number>> = {
  solana: 0,
  base: 1,
  bsc: 2,
  ethereum: 3,
};
const DEFAULT_CHAIN_PRIORITY = 100;

export interface CandidatePair {
  pair: DexPair;
  chain: ChainId;
}

function familyMatches(chain: ChainId, requested: ResolvedChain): boolean {
  if (requested === 'solana') return chain === 'solana';
  return chain !== 'solana';
}

function liquidityOf(pair: DexPair): number {
  return pair.liquidity?.usd ?? 0;
}

function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function parsePrice(value: string | null | undefined): number | null {
  if (!value) return null;
  const price = Number(value);
  return Number.isFinite(price) && price > 0 ? price : null;
}

function toPriceInfo(candidate: CandidatePair, tokenAddress: string): PriceInfo {
  const { pair, chain } = candidate;
  const token = sameAddress(pair.baseToken.address, tokenAddress)
    ? pair.baseToken
    : sameAddress(pair.quoteToken.address, tokenAddress)
      ? pair.quoteToken
      : pair.baseToken;

  return {
    address: normalizeAddress(token.address, chain === 'solana' ? 'solana' : 'evm-like'),
    chain,
    priceUsd: parsePrice(pair.priceUsd),
    marketCap: pair.marketCap ?? pair.fdv ?? null,
    symbol: token.symbol ?? null,
    name: token.name ?? null,
    liquidityUsd: pair.liquidity?.usd ?? null,
    dexUrl: pair.url ?? `https://dexscreener.com/${pair.chainId}/${pair.pairAddress}`,
  };
}

/**
 * Picks the pair to price from. A concrete requested chain wins outright;
 * otherwise chain priority, then USD liquidity.
 */
export function pickBestPair(pairs: DexPair[], chain: ResolvedChain): CandidatePair | null {
  const candidates: CandidatePair[] = [];
  for (const pair of pairs) {
    const pairChain = normalizeChainName(pair.chainId);
    if (pairChain && familyMatches(pairChain, chain)) {
      candidates.push({ pair, chain: pairChain });
    }
  }
  if (candidates.length === 0) return null;

  if (chain !== 'evm-like') {
    const onChain = candidates.filter((candidate) => candidate.chain === chain);
    if (onChain.length > 0) {
      return onChain.reduce((best, candidate) =>
        liquidityOf(candidate.pair) > liquidityOf(best.pair) ? candidate : best,
      );
    }
  }

  const ranked = [...candidates].sort((a, b) => {
    const byChain =
      (CHAIN_PRIORITY[a.chain] ?? DEFAULT_CHAIN_PRIORITY) -
      (CHAIN_PRIORITY[b.chain] ?? DEFAULT_CHAIN_PRIORITY);
    return byChain !== 0 ? byChain : liquidityOf(b.pair) - liquidityOf(a.pair);
  });
  return ranked[0] ?? null;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

export class PriceEnrichmentService {
  private readonly container: Container;
  private readonly fetchFn: FetchFn;
  private readonly cache: PriceCache | null;

  constructor(container: Container, deps: PriceEnrichmentDeps = {}) {
    this.container = container;
    this.fetchFn = deps.fetchFn ?? ((url, init) => fetch(url, init));
    this.cache = deps.cache ?? null;
  }

  /**
   * Best-effort market data for a token. Never throws for upstream trouble:
   * timeouts, network errors, rate limits and malformed payloads come back as
   * `failed` with a reason.
   */
  async lookup(address: string, chain: ResolvedChain): Promise<PriceLookupResult> {
    const { logger } = this.container;

    const cached = this.cache ? await this.cache.get(address, chain) : null;
    if (cached) {
      logger.debug({ address, chain }, 'Price cache hit');
      return { status: 'found', info: cached, cached: true };
    }

    try {
      const info =
        (await this.lookupToken(address, chain)) ??
        (chain !== 'evm-like' ? await this.lookupPair(address, chain) : null);

      if (!info) {
        logger.info({ address, chain }, 'Token not listed on DEX Screener');
        return { status: 'not-found' };
      }

      if (this.cache) {
        await this.cache.set(address, chain, info);
      }

      logger.debug(
        { address, chain: info.chain, priceUsd: info.priceUsd, symbol: info.symbol },
        'Price resolved',
      );
      return { status: 'found', info, cached: false };
    } catch (err) {
      if (err instanceof PriceLookupError) {
        logger.warn(
          { address, chain, reason: err.reason, error: err.message },
          'Price lookup failed',
        );
        return { status: 'failed', reason: err.reason, message: err.message };
      }
      throw err;
    }
  }

  private async lookupToken(address: string, chain: ResolvedChain): Promise<PriceInfo | null> {
    const data = await this.request(
      `/latest/dex/tokens/${encodeURIComponent(address)}`,
      tokenPairsResponseSchema,
    );
    if (!data) return null;

    const pairs = Array.isArray(data) ? data : (data.pairs ?? []);
    const best = pickBestPair(pairs, chain);
    return best ? toPriceInfo(best, address) : null;
  }

  /** DEX Screener links usually carry the pool address, not the token. */
  private async lookupPair(pairAddress: string, chain: ChainId): Promise<PriceInfo | null> {
    const data = await this.request(
      `/latest/dex/pairs/${chain}/${encodeURIComponent(pairAddress)}`,
      pairResponseSchema,
    );
    const pair = data?.pair ?? data?.pairs?.[0];
    if (!pair) return null;

    const pairChain = normalizeChainName(pair.chainId) ?? chain;
    return toPriceInfo({ pair, chain: pairChain }, pair.baseToken.address);
  }

  private async request<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T | null> {
    const { priceApiBaseUrl, priceLookupTimeoutMs } = this.container.settings;
    const url = `${priceApiBaseUrl}${path}`;

    let body: unknown;
    try {
      const res = await this.fetchFn(url, {
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(priceLookupTimeoutMs),
      });

      if (res.status === 404) return null;
      if (res.status === 429) {
        throw new PriceLookupError('rate-limited', 'Rate limited by DEX Screener');
      }
      if (!res.ok) {
        throw new PriceLookupError('bad-response', `DEX Screener returned HTTP ${res.status}`);
      }

      body = await res.json();
    } catch (err) {
      if (err instanceof PriceLookupError) throw err;
      if (isTimeout(err)) {
        throw new PriceLookupError(
          'timeout',
          `DEX Screener did not answer within ${priceLookupTimeoutMs}ms`,
          { cause: err },
        );
      }
      if (err instanceof SyntaxError) {
        throw new PriceLookupError('bad-response', 'DEX Screener sent invalid JSON', {
          cause: err,
        });
      }
      throw new PriceLookupError('network', `DEX Screener request failed: ${describeError(err)}`, {
        cause: err,
      });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new PriceLookupError(
        'bad-response',
        `Unexpected DEX Screener payload${issue ? ` at ${issue.path.join('.') || '(root)'}: ${issue.message}` : ''}`,
      );
    }
    return parsed.data;
  }
}
