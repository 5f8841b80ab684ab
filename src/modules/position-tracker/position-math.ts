import type { PositionStatus, PositionTotals } from '../../types/position.js';

export type SellOutcome =
  | { ok: true; totals: PositionTotals; realizedPnlDelta: number; costBasis: number }
  | { ok: false; remaining: number };

export function pickTotals(source: PositionTotals): PositionTotals {
  return {
    totalBought: source.totalBought,
    totalSold: source.totalSold,
    remainingTokens: source.remainingTokens,
    totalCostUsd: source.totalCostUsd,
    totalProceedsUsd: source.totalProceedsUsd,
    realizedPnlUsd: source.realizedPnlUsd,
  };
}

/** CLOSED once everything bought is sold; PARTIAL after the first sell. */
export function deriveStatus(totals: PositionTotals): PositionStatus {
  if (totals.totalBought > 0 && totals.remainingTokens === 0) return 'CLOSED';
  if (totals.totalSold > 0) return 'PARTIAL';
  return 'OPEN';
}

export function averageCost(totals: PositionTotals): number {
  return totals.totalBought > 0 ? totals.totalCostUsd / totals.totalBought : 0;
}

export function applyBuy(totals: PositionTotals, amountTokens: number, valueUsd: number): PositionTotals {
  return {
    ...totals,
    totalBought: totals.totalBought + amountTokens,
    remainingTokens: totals.remainingTokens + amountTokens,
    totalCostUsd: totals.totalCostUsd + valueUsd,
  };
}

/**
 * Weighted-average cost sell. A quantity within `tolerance` (relative to
 * what is held) of the remainder closes the position exactly; anything
 * larger is refused.
 */
export function applySell(
  totals: PositionTotals,
  amountTokens: number,
  valueUsd: number,
  tolerance: number,
): SellOutcome {
  const held = totals.remainingTokens;
  const slack = held * tolerance;

  if (amountTokens > held + slack) {
    return { ok: false, remaining: held };
  }

  const closesOut = Math.abs(amountTokens - held) <= slack;
  const sold = closesOut ? held : amountTokens;
  const costBasis = averageCost(totals) * sold;
  const realizedPnlDelta = valueUsd - costBasis;

  return {
    ok: true,
    costBasis,
    realizedPnlDelta,
    totals: {
      totalBought: totals.totalBought,
      totalSold: closesOut ? totals.totalBought : totals.totalSold + sold,
      remainingTokens: closesOut ? 0 : held - sold,
      totalCostUsd: totals.totalCostUsd,
      totalProceedsUsd: totals.totalProceedsUsd + valueUsd,
      realizedPnlUsd: totals.realizedPnlUsd + realizedPnlDelta,
    },
  };
}
