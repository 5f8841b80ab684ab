import { z } from 'zod';

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS wallets (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    address TEXT NOT NULL,
    chain TEXT NOT NULL,
    nickname TEXT,
    created_at TEXT NOT NULL,
    UNIQUE (address, chain)
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_wallets_nickname ON wallets(nickname)
    WHERE nickname IS NOT NULL;

  CREATE TABLE IF NOT EXISTS tokens (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    address TEXT NOT NULL,
    chain TEXT NOT NULL,
    symbol TEXT,
    name TEXT,
    created_at TEXT NOT NULL,
    UNIQUE (address, chain)
  );

  CREATE TABLE IF NOT EXISTS positions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    token_id INTEGER NOT NULL REFERENCES tokens(id),
    wallet_id INTEGER REFERENCES wallets(id),
    status TEXT NOT NULL DEFAULT 'OPEN' CHECK (status IN ('OPEN', 'PARTIAL', 'CLOSED')),
    total_bought REAL NOT NULL DEFAULT 0 CHECK (total_bought >= 0),
    total_sold REAL NOT NULL DEFAULT 0 CHECK (total_sold >= 0),
    remaining_tokens REAL NOT NULL DEFAULT 0 CHECK (remaining_tokens >= 0),
    total_cost_usd REAL NOT NULL DEFAULT 0,
    total_proceeds_usd REAL NOT NULL DEFAULT 0,
    realized_pnl_usd REAL NOT NULL DEFAULT 0,
    opened_at TEXT NOT NULL,
    closed_at TEXT,
    version INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  -- One live position per (token, wallet); NULL wallet counts as its own key
  CREATE UNIQUE INDEX IF NOT EXISTS idx_positions_live
    ON positions(token_id, IFNULL(wallet_id, 0))
    WHERE status IN ('OPEN', 'PARTIAL');

  CREATE INDEX IF NOT EXISTS idx_positions_status ON positions(status);
  CREATE INDEX IF NOT EXISTS idx_positions_token ON positions(token_id);

  CREATE TABLE IF NOT EXISTS trades (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    token_id INTEGER NOT NULL REFERENCES tokens(id),
    wallet_id INTEGER REFERENCES wallets(id),
    position_id INTEGER REFERENCES positions(id),
    direction TEXT NOT NULL CHECK (direction IN ('BUY', 'SELL')),
    amount_spent REAL,
    spend_currency TEXT,
    amount_tokens REAL CHECK (amount_tokens IS NULL OR amount_tokens >= 0),
    price_usd REAL,
    total_value_usd REAL,
    market_cap_at_trade REAL,
    source_message TEXT NOT NULL,
    notes_url TEXT,
    dex_screener_url TEXT,
    trade_timestamp TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_trades_token ON trades(token_id);
  CREATE INDEX IF NOT EXISTS idx_trades_position ON trades(position_id);
`;

const isoDate = z.string().transform((value) => new Date(value));

export const tokenRowSchema = z
  .object({
    id: z.number().int(),
    address: z.string(),
    chain: z.string(),
    symbol: z.string().nullable(),
    name: z.string().nullable(),
    created_at: isoDate,
  })
  .transform((row) => ({
    id: row.id,
    address: row.address,
    chain: row.chain,
    symbol: row.symbol,
    name: row.name,
    createdAt: row.created_at,
  }));

export const walletRowSchema = z
  .object({
    id: z.number().int(),
    address: z.string(),
    chain: z.string(),
    nickname: z.string().nullable(),
    created_at: isoDate,
  })
  .transform((row) => ({
    id: row.id,
    address: row.address,
    chain: row.chain,
    nickname: row.nickname,
    createdAt: row.created_at,
  }));

const positionColumns = {
  id: z.number().int(),
  token_id: z.number().int(),
  wallet_id: z.number().int().nullable(),
  status: z.enum(['OPEN', 'PARTIAL', 'CLOSED']),
  total_bought: z.number(),
  total_sold: z.number(),
  remaining_tokens: z.number(),
  total_cost_usd: z.number(),
  total_proceeds_usd: z.number(),
  realized_pnl_usd: z.number(),
  opened_at: isoDate,
  closed_at: isoDate.nullable(),
  version: z.number().int(),
};

type PositionColumns = z.infer<z.ZodObject<typeof positionColumns>>;

function toPositionRecord(row: PositionColumns) {
  return {
    id: row.id,
    tokenId: row.token_id,
    walletId: row.wallet_id,
    status: row.status,
    totalBought: row.total_bought,
    totalSold: row.total_sold,
    remainingTokens: row.remaining_tokens,
    totalCostUsd: row.total_cost_usd,
    totalProceedsUsd: row.total_proceeds_usd,
    realizedPnlUsd: row.realized_pnl_usd,
    openedAt: row.opened_at,
    closedAt: row.closed_at,
    version: row.version,
  };
}

export const positionRowSchema = z.object(positionColumns).transform(toPositionRecord);

export const positionViewRowSchema = z
  .object({
    ...positionColumns,
    token_address: z.string(),
    chain: z.string(),
    symbol: z.string().nullable(),
    wallet_nickname: z.string().nullable(),
  })
  .transform((row) => ({
    ...toPositionRecord(row),
    tokenAddress: row.token_address,
    chain: row.chain,
    symbol: row.symbol,
    walletNickname: row.wallet_nickname,
  }));

const tradeColumns = {
  id: z.number().int(),
  token_id: z.number().int(),
  wallet_id: z.number().int().nullable(),
  position_id: z.number().int().nullable(),
  direction: z.enum(['BUY', 'SELL']),
  amount_spent: z.number().nullable(),
  spend_currency: z.string().nullable(),
  amount_tokens: z.number().nullable(),
  price_usd: z.number().nullable(),
  total_value_usd: z.number().nullable(),
  market_cap_at_trade: z.number().nullable(),
  source_message: z.string(),
  notes_url: z.string().nullable(),
  dex_screener_url: z.string().nullable(),
  trade_timestamp: isoDate,
  created_at: isoDate,
};

type TradeColumns = z.infer<z.ZodObject<typeof tradeColumns>>;

function toTradeRecord(row: TradeColumns) {
  return {
    id: row.id,
    tokenId: row.token_id,
    walletId: row.wallet_id,
    positionId: row.position_id,
    direction: row.direction,
    amountSpent: row.amount_spent,
    spendCurrency: row.spend_currency,
    amountTokens: row.amount_tokens,
    priceUsd: row.price_usd,
    totalValueUsd: row.total_value_usd,
    marketCapAtTrade: row.market_cap_at_trade,
    sourceMessage: row.source_message,
    notesUrl: row.notes_url,
    dexScreenerUrl: row.dex_screener_url,
    tradeTimestamp: row.trade_timestamp,
    createdAt: row.created_at,
  };
}

export const tradeRowSchema = z.object(tradeColumns).transform(toTradeRecord);

export const tradeLogRowSchema = z
  .object({
    ...tradeColumns,
    symbol: z.string().nullable(),
    chain: z.string(),
    token_address: z.string(),
    position_status: z.string().nullable(),
  })
  .transform((row) => ({
    ...toTradeRecord(row),
    symbol: row.symbol,
    chain: row.chain,
    tokenAddress: row.token_address,
    positionStatus: row.position_status,
  }));

export const tradingStatsRowSchema = z.object({
  total_trades: z.number(),
  total_positions: z.number(),
  open_positions: z.number(),
  realized_pnl_usd: z.number(),
  total_invested_usd: z.number(),
});

export const countRowSchema = z.object({ count: z.number() });
