import type { ChainConfidence, ResolvedChain } from './chain.js';

export type TradeDirection = 'BUY' | 'SELL';

export const USD_PEGGED_CURRENCIES = ['USD', 'USDC', 'USDT', 'DAI'] as const;

export const SPEND_CURRENCIES = [
  ...USD_PEGGED_CURRENCIES,
  'ETH',
  'SOL',
  'BTC',
  'BNB',
  'MATIC',
  'AVAX',
  'FTM',
] as const;

export type SpendCurrency = (typeof SPEND_CURRENCIES)[number];

export function isUsdPegged(currency: SpendCurrency): boolean {
  return USD_PEGGED_CURRENCIES.some((pegged) => pegged === currency);
}

export interface SpendAmount {
  amount: number;
  currency: SpendCurrency;
}

export interface DexLink {
  url: string;
  chainSlug: string;
  address: string;
}

/** Normalized, pre-persistence reading of one chat message. */
export interface TradeIntent {
  direction: TradeDirection;
  chain: ResolvedChain;
  chainConfidence: ChainConfidence;
  address: string;
  spend: SpendAmount | null;
  marketCap: number | null;
  priceUsd: number | null;
  amountTokens: number | null;
  /** Spend is known but the token amount waits for a price lookup. */
  amountTokensDeferred: boolean;
  symbolHint: string | null;
  walletTag: string | null;
  dexUrl: string | null;
  notesUrl: string | null;
  rawText: string;
}

export interface TokenIdentity {
  address: string;
  chain: ResolvedChain;
  symbol: string | null;
  name: string | null;
}

export interface WalletIdentity {
  address: string;
  chain: string;
}

/** A finalized trade that has not been written yet. */
export interface PendingTrade {
  token: TokenIdentity;
  /** Created on first use inside the trade's transaction. */
  wallet: WalletIdentity | null;
  direction: TradeDirection;
  amountSpent: number | null;
  spendCurrency: SpendCurrency | null;
  amountTokens: number | null;
  priceUsd: number | null;
  totalValueUsd: number | null;
  marketCapAtTrade: number | null;
  sourceMessage: string;
  notesUrl: string | null;
  dexScreenerUrl: string | null;
  tradeTimestamp: Date;
}

export interface NewTradeRecord {
  tokenId: number;
  walletId: number | null;
  positionId: number | null;
  direction: TradeDirection;
  amountSpent: number | null;
  spendCurrency: string | null;
  amountTokens: number | null;
  priceUsd: number | null;
  totalValueUsd: number | null;
  marketCapAtTrade: number | null;
  sourceMessage: string;
  notesUrl: string | null;
  dexScreenerUrl: string | null;
  tradeTimestamp: Date;
}

export interface TradeRecord extends NewTradeRecord {
  id: number;
  createdAt: Date;
}

export interface TradeLogEntry extends TradeRecord {
  symbol: string | null;
  chain: string;
  tokenAddress: string;
  positionStatus: string | null;
}
