import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import fc from 'fast-check';
import { PositionTracker } from './position-tracker.service.js';
import { JournalStore } from '../journal-store/journal.store.js';
import { EventBus } from '../../services/event-bus.js';
import {
  OrphanSellError,
  OversellError,
  PositionConflictError,
} from '../../services/errors.js';
import type { Container } from '../../infra/container.js';
import type { JournalEvent } from '../../types/events.js';
import type { PendingTrade, TradeDirection } from '../../types/trade.js';

const ADDRESS = '0x20dd04c17afd5c9a8b3f2cdacaa8ee7907385bef';

function createContainer(store: JournalStore): Container {
  return {
    logger: {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    } as unknown as Container['logger'],
    db: store,
    redis: null,
    settings: {
      priceApiBaseUrl: 'https://api.dexscreener.test',
      priceLookupTimeoutMs: 1000,
      priceCacheTtlSeconds: 0,
      positionUpdateMaxRetries: 3,
      oversellTolerance: 1e-8,
      authorizedSenders: [],
    },
  };
}

let clock = Date.parse('2026-03-01T00:00:00.000Z');

function trade(
  direction: TradeDirection,
  amountTokens: number | null,
  totalValueUsd: number | null,
  overrides: Partial<PendingTrade> = {},
): PendingTrade {
  clock += 60_000;
  return {
    token: { address: ADDRESS, chain: 'base', symbol: 'PEPE', name: null },
    wallet: null,
    direction,
    amountSpent: totalValueUsd,
    spendCurrency: totalValueUsd === null ? null : 'USD',
    amountTokens,
    priceUsd: amountTokens && totalValueUsd !== null ? totalValueUsd / amountTokens : null,
    totalValueUsd,
    marketCapAtTrade: null,
    sourceMessage: `${direction} ${amountTokens ?? '?'} for ${totalValueUsd ?? '?'}`,
    notesUrl: null,
    dexScreenerUrl: null,
    tradeTimestamp: new Date(clock),
    ...overrides,
  };
}

describe('PositionTracker', () => {
  let store: JournalStore;
  let container: Container;
  let eventBus: EventBus;
  let events: JournalEvent[];
  let tracker: PositionTracker;

  beforeEach(() => {
    store = new JournalStore(new Database(':memory:'));
    container = createContainer(store);
    eventBus = new EventBus(container.logger);
    events = [];
    eventBus.on((event) => {
      events.push(event);
    });
    tracker = new PositionTracker(container, eventBus);
  });

  afterEach(() => {
    store.close();
  });

  it('walks a position from open through partial to closed', async () => {
    // Buy 1000 for $100
    const buy = await tracker.applyTrade(trade('BUY', 1000, 100));
    expect(buy.opened).toBe(true);
    expect(buy.applied).toBe(true);
    expect(buy.position).toMatchObject({
      status: 'OPEN',
      totalBought: 1000,
      totalCostUsd: 100,
      remainingTokens: 1000,
      realizedPnlUsd: 0,
    });

    // Sell half for $80: cost basis 50, PnL 30
    const firstSell = await tracker.applyTrade(trade('SELL', 500, 80));
    expect(firstSell.realizedPnlDelta).toBeCloseTo(30, 10);
    expect(firstSell.position).toMatchObject({
      id: buy.position.id,
      status: 'PARTIAL',
      remainingTokens: 500,
      totalSold: 500,
      totalProceedsUsd: 80,
    });
    expect(firstSell.position.realizedPnlUsd).toBeCloseTo(30, 10);

    // Sell the rest for $60: PnL 30 + 10
    const lastTrade = trade('SELL', 500, 60);
    const secondSell = await tracker.applyTrade(lastTrade);
    expect(secondSell.closed).toBe(true);
    expect(secondSell.position.status).toBe('CLOSED');
    expect(secondSell.position.remainingTokens).toBe(0);
    expect(secondSell.position.realizedPnlUsd).toBeCloseTo(40, 10);
    expect(secondSell.position.closedAt).toEqual(lastTrade.tradeTimestamp);

    const stored = store.getPosition(buy.position.id);
    expect(stored?.status).toBe('CLOSED');
    expect(stored?.version).toBe(3);
    expect(store.listTradesForPosition(buy.position.id)).toHaveLength(3);
    expect(events.map((event) => event.type)).toEqual([
      'TRADE_RECORDED',
      'POSITION_OPENED',
      'TRADE_RECORDED',
      'TRADE_RECORDED',
      'POSITION_CLOSED',
    ]);
  });

  it('refuses a sell with no open position and writes nothing', async () => {
    await expect(tracker.applyTrade(trade('SELL', 500, 80))).rejects.toBeInstanceOf(
      OrphanSellError,
    );

    expect(store.countTrades()).toBe(0);
    expect(store.listPositions()).toEqual([]);
    expect(store.findToken(ADDRESS, 'base')).toBeNull();
    expect(events).toEqual([]);
  });

  it('names the token in the orphan sell error', async () => {
    await expect(tracker.applyTrade(trade('SELL', 1, 1))).rejects.toThrow(
      'No open position for PEPE: a sell needs an earlier buy. Nothing was recorded.',
    );
  });

  it('counts a repeated buy twice', async () => {
    await tracker.applyTrade(trade('BUY', 1000, 100));
    const second = await tracker.applyTrade(trade('BUY', 1000, 100));

    expect(second.opened).toBe(false);
    expect(second.position.totalBought).toBe(2000);
    expect(second.position.totalCostUsd).toBe(200);
    expect(store.countTrades()).toBe(2);
  });

  it('rejects an oversell and leaves the position untouched', async () => {
    const buy = await tracker.applyTrade(trade('BUY', 100, 10));

    const attempt = tracker.applyTrade(trade('SELL', 150, 30));
    await expect(attempt).rejects.toBeInstanceOf(OversellError);
    await expect(attempt).rejects.toThrow(
      'Sell of 150 PEPE exceeds the 100 held in position #1. Nothing was recorded.',
    );

    expect(store.countTrades()).toBe(1);
    expect(store.getPosition(buy.position.id)).toMatchObject({
      remainingTokens: 100,
      totalSold: 0,
      version: 1,
    });
  });

  it('closes exactly when a sell overshoots by rounding drift', async () => {
    await tracker.applyTrade(trade('BUY', 1000, 100));
    const sell = await tracker.applyTrade(trade('SELL', 1000.000001, 120));

    expect(sell.position.status).toBe('CLOSED');
    expect(sell.position.remainingTokens).toBe(0);
    expect(sell.position.totalSold).toBe(1000);
    expect(sell.realizedPnlDelta).toBeCloseTo(20, 10);
  });

  it('opens a fresh position when buying after a close', async () => {
    const first = await tracker.applyTrade(trade('BUY', 10, 10));
    await tracker.applyTrade(trade('SELL', 10, 20));

    const again = await tracker.applyTrade(trade('BUY', 5, 5));

    expect(again.opened).toBe(true);
    expect(again.position.id).not.toBe(first.position.id);
    expect(again.position.realizedPnlUsd).toBe(0);
  });

  it('keeps a partial position partial after another buy', async () => {
    await tracker.applyTrade(trade('BUY', 1000, 100));
    await tracker.applyTrade(trade('SELL', 100, 20));
    const rebuy = await tracker.applyTrade(trade('BUY', 500, 50));

    expect(rebuy.position.status).toBe('PARTIAL');
    expect(rebuy.position.remainingTokens).toBe(1400);
    expect(rebuy.realizedPnlDelta).toBe(0);
  });

  it('records unpriced trades without touching the totals', async () => {
    const buy = await tracker.applyTrade(trade('BUY', null, null));

    expect(buy.applied).toBe(false);
    expect(buy.opened).toBe(true);
    expect(buy.trade.positionId).toBe(buy.position.id);
    expect(buy.position).toMatchObject({ totalBought: 0, totalCostUsd: 0, version: 0 });

    const sell = await tracker.applyTrade(trade('SELL', 10, null));
    expect(sell.applied).toBe(false);
    expect(sell.position.id).toBe(buy.position.id);
    expect(store.countTrades()).toBe(2);
  });

  it('scopes positions by wallet', async () => {
    const wallet = { address: '0x1111111111111111111111111111111111111111', chain: 'base' };
    await tracker.applyTrade(trade('BUY', 10, 10));

    await expect(tracker.applyTrade(trade('SELL', 10, 10, { wallet }))).rejects.toBeInstanceOf(
      OrphanSellError,
    );
    expect(store.listWallets()).toEqual([]);

    const walletBuy = await tracker.applyTrade(trade('BUY', 5, 5, { wallet }));
    expect(walletBuy.opened).toBe(true);
    expect(walletBuy.position.walletId).toBe(store.findWallet(wallet.address, 'base')?.id);
    expect(store.listOpenPositions()).toHaveLength(2);
  });

  it('finds the position when a sell names the chain the buy left open', async () => {
    await tracker.applyTrade(
      trade('BUY', 10, 10, { token: { address: ADDRESS, chain: 'evm-like', symbol: null, name: null } }),
    );
    const sell = await tracker.applyTrade(trade('SELL', 10, 15));
    expect(sell.position.status).toBe('CLOSED');
  });

  it('retries when the position version moved', async () => {
    const update = vi.spyOn(store, 'updatePosition').mockReturnValueOnce(false);

    const result = await tracker.applyTrade(trade('BUY', 10, 10));

    expect(update).toHaveBeenCalledTimes(2);
    expect(result.position.totalBought).toBe(10);
    expect(store.countTrades()).toBe(1);
    expect(store.listPositions()).toHaveLength(1);
    expect(container.logger.warn).toHaveBeenCalledTimes(1);
  });

  it('gives up after the configured retries', async () => {
    const update = vi.spyOn(store, 'updatePosition').mockReturnValue(false);

    await expect(tracker.applyTrade(trade('BUY', 10, 10))).rejects.toBeInstanceOf(
      PositionConflictError,
    );
    expect(update).toHaveBeenCalledTimes(4);
    expect(store.countTrades()).toBe(0);
  });

  it('serializes concurrent trades on the same position', async () => {
    await tracker.applyTrade(trade('BUY', 100, 100));

    const results = await Promise.all(
      Array.from({ length: 5 }, () => tracker.applyTrade(trade('BUY', 10, 10))),
    );

    expect(results.map((result) => result.position.version)).toEqual([2, 3, 4, 5, 6]);
    expect(store.getPosition(results[0]?.position.id ?? 0)?.totalBought).toBe(150);
  });

  it('keeps remaining = bought - sold and moves PnL only on sells', async () => {
    const step = fc.record({
      direction: fc.constantFrom<TradeDirection>('BUY', 'SELL'),
      amount: fc.integer({ min: 1, max: 1_000_000 }),
      percent: fc.integer({ min: 0, max: 100 }),
      value: fc.integer({ min: 0, max: 100_000 }),
    });

    await fc.assert(
      fc.asyncProperty(fc.array(step, { minLength: 1, maxLength: 12 }), async (steps) => {
        const runStore = new JournalStore(new Database(':memory:'));
        const runContainer = createContainer(runStore);
        const runTracker = new PositionTracker(runContainer, new EventBus(runContainer.logger));
        let held = 0;
        let pnlBefore = 0;

        try {
          for (const s of steps) {
            if (s.direction === 'SELL' && held === 0) continue;

            const amount = s.direction === 'BUY' ? s.amount : (held * s.percent) / 100;
            const result = await runTracker.applyTrade(trade(s.direction, amount, s.value));
            const p = result.position;

            expect(p.remainingTokens).toBeGreaterThanOrEqual(0);
            expect(Math.abs(p.remainingTokens - (p.totalBought - p.totalSold))).toBeLessThanOrEqual(
              1e-6 * Math.max(1, p.totalBought),
            );
            if (s.direction === 'BUY') {
              expect(p.realizedPnlUsd).toBe(result.opened ? 0 : pnlBefore);
            }

            held = p.status === 'CLOSED' ? 0 : p.remainingTokens;
            pnlBefore = p.status === 'CLOSED' ? 0 : p.realizedPnlUsd;
          }
        } finally {
          runStore.close();
        }
      }),
      { numRuns: 40 },
    );
  });
});
