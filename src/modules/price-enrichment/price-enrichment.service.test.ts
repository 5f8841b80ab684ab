import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { PriceEnrichmentService, pickBestPair } from './price-enrichment.service.js';
import type { FetchFn } from './price-enrichment.service.js';
import type { PriceCache } from './price-cache.js';
import type { DexPair } from './dexscreener.schema.js';
import type { Container } from '../../infra/container.js';
import type { PriceInfo } from '../../types/price.js';

const TOKEN = '0x20DD04c17AFD5c9a8b3f2cdacaa8Ee7907385BEF';
const TOKEN_LOWER = TOKEN.toLowerCase();
const WETH = '0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2';
const MINT = '7GCihgDB8fe6KNjn2MYtkzZcRjQy3t9GHdC8uHYmW2hr';

function createMockContainer(): Container {
  return {
    logger: {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    } as unknown as Container['logger'],
    db: {} as Container['db'],
    redis: null,
    settings: {
      priceApiBaseUrl: 'https://api.dexscreener.test',
      priceLookupTimeoutMs: 1000,
      priceCacheTtlSeconds: 60,
      positionUpdateMaxRetries: 3,
      oversellTolerance: 1e-8,
      authorizedSenders: [],
    },
  };
}

function dexPair(chainId: string, liquidityUsd: number, overrides: Partial<DexPair> = {}): DexPair {
  return {
    chainId,
    pairAddress: `pair-${chainId}-${liquidityUsd}`,
    baseToken: { address: TOKEN, name: 'Pepe Test', symbol: 'PEPE' },
    quoteToken: { address: WETH, name: 'Wrapped Ether', symbol: 'WETH' },
    priceUsd: '0.0001',
    liquidity: { usd: liquidityUsd },
    marketCap: 1_000_000,
    ...overrides,
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('pickBestPair', () => {
  it('prefers the requested chain, then liquidity on it', () => {
    const best = pickBestPair(
      [dexPair('ethereum', 90_000), dexPair('base', 100), dexPair('base', 500)],
      'base',
    );
    expect(best?.chain).toBe('base');
    expect(best?.pair.liquidity?.usd).toBe(500);
  });

  it('ranks by chain priority when the chain is open', () => {
    const best = pickBestPair(
      [dexPair('ethereum', 90_000), dexPair('bsc', 50), dexPair('base', 10)],
      'evm-like',
    );
    expect(best?.chain).toBe('base');
  });

  it('falls back to priority when the requested chain has no pair', () => {
    const best = pickBestPair([dexPair('ethereum', 10), dexPair('arbitrum', 1_000)], 'base');
    expect(best?.chain).toBe('ethereum');
  });

  it('ignores pairs from another address family or an unknown chain', () => {
    expect(pickBestPair([dexPair('solana', 10), dexPair('sui', 10)], 'evm-like')).toBeNull();
  });
});

describe('PriceEnrichmentService', () => {
  let container: Container;
  let fetchFn: Mock<FetchFn>;
  let service: PriceEnrichmentService;

  beforeEach(() => {
    container = createMockContainer();
    fetchFn = vi.fn<FetchFn>();
    service = new PriceEnrichmentService(container, { fetchFn });
  });

  it('resolves price, market cap and identity from the token endpoint', async () => {
    fetchFn.mockImplementation(async () => jsonResponse({ pairs: [dexPair('base', 5_000)] }));

    const result = await service.lookup(TOKEN_LOWER, 'evm-like');

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0]?.[0]).toBe(
      `https://api.dexscreener.test/latest/dex/tokens/${TOKEN_LOWER}`,
    );
    expect(result).toEqual({
      status: 'found',
      cached: false,
      info: {
        address: TOKEN_LOWER,
        chain: 'base',
        priceUsd: 0.0001,
        marketCap: 1_000_000,
        symbol: 'PEPE',
        name: 'Pepe Test',
        liquidityUsd: 5_000,
        dexUrl: 'https://dexscreener.com/base/pair-base-5000',
      },
    });
  });

  it('uses fdv when market cap is missing and the pair url when present', async () => {
    fetchFn.mockImplementation(async () =>
      jsonResponse([
        dexPair('ethereum', 1, {
          marketCap: null,
          fdv: 2_500_000,
          url: 'https://dexscreener.com/ethereum/0xpool',
        }),
      ]),
    );

    const result = await service.lookup(TOKEN_LOWER, 'ethereum');
    expect(result.status).toBe('found');
    if (result.status === 'found') {
      expect(result.info.marketCap).toBe(2_500_000);
      expect(result.info.dexUrl).toBe('https://dexscreener.com/ethereum/0xpool');
    }
  });

  it('describes the quote token when that is the one asked for', async () => {
    fetchFn.mockImplementation(async () => jsonResponse({ pairs: [dexPair('ethereum', 1)] }));

    const result = await service.lookup(WETH.toLowerCase(), 'ethereum');
    expect(result.status === 'found' && result.info.symbol).toBe('WETH');
  });

  it('retries a concrete chain as a pair address', async () => {
    fetchFn
      .mockImplementationOnce(async () => jsonResponse({ pairs: null }))
      .mockImplementationOnce(async () =>
        jsonResponse({
          pair: dexPair('solana', 800, {
            pairAddress: MINT,
            baseToken: { address: 'So11111111111111111111111111111111111111112', symbol: 'WSOL' },
          }),
        }),
      );

    const result = await service.lookup(MINT, 'solana');

    expect(fetchFn.mock.calls[1]?.[0]).toBe(
      `https://api.dexscreener.test/latest/dex/pairs/solana/${MINT}`,
    );
    expect(result.status).toBe('found');
    if (result.status === 'found') {
      expect(result.info.address).toBe('So11111111111111111111111111111111111111112');
      expect(result.info.symbol).toBe('WSOL');
      expect(result.info.chain).toBe('solana');
    }
  });

  it('does not try the pair endpoint for an open EVM chain', async () => {
    fetchFn.mockImplementation(async () => jsonResponse({ pairs: [] }));

    const result = await service.lookup(TOKEN_LOWER, 'evm-like');

    expect(result).toEqual({ status: 'not-found' });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(container.logger.info).toHaveBeenCalled();
  });

  it('treats 404 as not found', async () => {
    fetchFn.mockImplementation(async () => jsonResponse({ message: 'not found' }, 404));

    expect(await service.lookup(TOKEN_LOWER, 'base')).toEqual({ status: 'not-found' });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it('reports rate limiting', async () => {
    fetchFn.mockImplementation(async () => jsonResponse({}, 429));

    const result = await service.lookup(TOKEN_LOWER, 'base');

    expect(result).toEqual({
      status: 'failed',
      reason: 'rate-limited',
      message: 'Rate limited by DEX Screener',
    });
    expect(container.logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ reason: 'rate-limited' }),
      'Price lookup failed',
    );
  });

  it('reports timeouts apart from network errors', async () => {
    fetchFn.mockRejectedValueOnce(
      new DOMException('The operation was aborted due to timeout', 'TimeoutError'),
    );
    const timedOut = await service.lookup(TOKEN_LOWER, 'base');
    expect(timedOut.status === 'failed' && timedOut.reason).toBe('timeout');

    fetchFn.mockRejectedValueOnce(new TypeError('fetch failed'));
    const offline = await service.lookup(TOKEN_LOWER, 'base');
    expect(offline).toEqual({
      status: 'failed',
      reason: 'network',
      message: 'DEX Screener request failed: fetch failed',
    });
  });

  it('rejects server errors and malformed payloads', async () => {
    fetchFn.mockImplementationOnce(async () => jsonResponse({}, 502));
    const serverError = await service.lookup(TOKEN_LOWER, 'base');
    expect(serverError.status === 'failed' && serverError.reason).toBe('bad-response');

    fetchFn.mockImplementationOnce(async () => jsonResponse({ pairs: 'nope' }));
    const malformed = await service.lookup(TOKEN_LOWER, 'base');
    expect(malformed.status === 'failed' && malformed.reason).toBe('bad-response');

    fetchFn.mockImplementationOnce(
      async () => new Response('<html>', { status: 200, headers: { 'content-type': 'text/html' } }),
    );
    const notJson = await service.lookup(TOKEN_LOWER, 'base');
    expect(notJson).toEqual({
      status: 'failed',
      reason: 'bad-response',
      message: 'DEX Screener sent invalid JSON',
    });
  });

  describe('with a cache', () => {
    const cachedInfo: PriceInfo = {
      address: TOKEN_LOWER,
      chain: 'base',
      priceUsd: 0.5,
      marketCap: null,
      symbol: 'PEPE',
      name: null,
      liquidityUsd: null,
      dexUrl: null,
    };

    it('answers from the cache without calling out', async () => {
      const cache: PriceCache = {
        get: vi.fn().mockResolvedValue(cachedInfo),
        set: vi.fn(),
      };
      service = new PriceEnrichmentService(container, { fetchFn, cache });

      const result = await service.lookup(TOKEN_LOWER, 'base');

      expect(result).toEqual({ status: 'found', info: cachedInfo, cached: true });
      expect(fetchFn).not.toHaveBeenCalled();
    });

    it('stores found prices', async () => {
      const cache: PriceCache = {
        get: vi.fn().mockResolvedValue(null),
        set: vi.fn().mockResolvedValue(undefined),
      };
      service = new PriceEnrichmentService(container, { fetchFn, cache });
      fetchFn.mockImplementation(async () => jsonResponse({ pairs: [dexPair('base', 1)] }));

      await service.lookup(TOKEN_LOWER, 'base');

      expect(cache.set).toHaveBeenCalledWith(
        TOKEN_LOWER,
        'base',
        expect.objectContaining({ chain: 'base', priceUsd: 0.0001 }),
      );
    });
  });
});
