export type PositionStatus = 'OPEN' | 'PARTIAL' | 'CLOSED';

/** Cumulative figures a position is re-derived from on every update. */
export interface PositionTotals {
  totalBought: number;
  totalSold: number;
  remainingTokens: number;
  totalCostUsd: number;
  totalProceedsUsd: number;
  realizedPnlUsd: number;
}

export interface PositionRecord extends PositionTotals {
  id: number;
  tokenId: number;
  walletId: number | null;
  status: PositionStatus;
  openedAt: Date;
  closedAt: Date | null;
  version: number;
}

export interface PositionView extends PositionRecord {
  tokenAddress: string;
  chain: string;
  symbol: string | null;
  walletNickname: string | null;
}

export interface TradingStats {
  totalTrades: number;
  totalPositions: number;
  openPositions: number;
  realizedPnlUsd: number;
  /** Sum of the USD value of every priced BUY. */
  totalInvestedUsd: number;
}

/** Fields a position update writes; `version` is bumped by the store. */
export interface PositionUpdate extends PositionTotals {
  status: PositionStatus;
  closedAt: Date | null;
}
