import { describe, it, expect } from 'vitest';
import { applyBuy, applySell, averageCost, deriveStatus } from './position-math.js';
import type { PositionTotals } from '../../types/position.js';

const ZERO: PositionTotals = {
  totalBought: 0,
  totalSold: 0,
  remainingTokens: 0,
  totalCostUsd: 0,
  totalProceedsUsd: 0,
  realizedPnlUsd: 0,
};

describe('position math', () => {
  it('derives status from the totals', () => {
    expect(deriveStatus(ZERO)).toBe('OPEN');
    expect(deriveStatus(applyBuy(ZERO, 10, 5))).toBe('OPEN');
    expect(deriveStatus({ ...ZERO, totalBought: 10, totalSold: 4, remainingTokens: 6 })).toBe('PARTIAL');
    expect(deriveStatus({ ...ZERO, totalBought: 10, totalSold: 10, remainingTokens: 0 })).toBe('CLOSED');
  });

  it('averages cost across buys', () => {
    const totals = applyBuy(applyBuy(ZERO, 100, 10), 300, 50);
    expect(averageCost(totals)).toBe(0.15);
    expect(averageCost(ZERO)).toBe(0);
  });

  it('realizes the difference between proceeds and proportional cost', () => {
    const outcome = applySell(applyBuy(ZERO, 1000, 100), 250, 40, 1e-8);

    expect(outcome).toEqual({
      ok: true,
      costBasis: 25,
      realizedPnlDelta: 15,
      totals: {
        totalBought: 1000,
        totalSold: 250,
        remainingTokens: 750,
        totalCostUsd: 100,
        totalProceedsUsd: 40,
        realizedPnlUsd: 15,
      },
    });
  });

  it('refuses to sell more than is held', () => {
    expect(applySell(applyBuy(ZERO, 100, 10), 101, 20, 1e-8)).toEqual({ ok: false, remaining: 100 });
  });

  it('snaps a sell within tolerance to a full close', () => {
    const under = applySell(applyBuy(ZERO, 100, 10), 99.9999999999, 20, 1e-8);
    expect(under.ok && under.totals.remainingTokens).toBe(0);
    expect(under.ok && under.totals.totalSold).toBe(100);
  });
});
