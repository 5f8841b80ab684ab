import type { TradeDirection } from './trade.js';
import type { PriceFailureReason } from './price.js';

export type JournalEventType =
  | 'TRADE_RECORDED'
  | 'TRADE_REJECTED'
  | 'POSITION_OPENED'
  | 'POSITION_CLOSED'
  | 'ENRICHMENT_FAILED';

export interface BaseEvent {
  id: string;
  type: JournalEventType;
  timestamp: number;
}

export interface TradeRecordedEvent extends BaseEvent {
  type: 'TRADE_RECORDED';
  tradeId: number;
  positionId: number | null;
  tokenAddress: string;
  chain: string;
  direction: TradeDirection;
  totalValueUsd: number | null;
  applied: boolean;
}

export interface TradeRejectedEvent extends BaseEvent {
  type: 'TRADE_REJECTED';
  code: string;
  reason: string;
}

export interface PositionLifecycleEvent extends BaseEvent {
  type: 'POSITION_OPENED' | 'POSITION_CLOSED';
  positionId: number;
  tokenId: number;
  realizedPnlUsd: number;
}

export interface EnrichmentFailedEvent extends BaseEvent {
  type: 'ENRICHMENT_FAILED';
  tokenAddress: string;
  chain: string;
  reason: PriceFailureReason | 'not-found';
}

export type JournalEvent =
  | TradeRecordedEvent
  | TradeRejectedEvent
  | PositionLifecycleEvent
  | EnrichmentFailedEvent;
