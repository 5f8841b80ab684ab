import type Database from 'better-sqlite3';
import type { z } from 'zod';
import { familyOf, isEvmChain, normalizeAddress } from '../chain-detector/index.js';
import { PersistenceError, isJournalError } from '../../services/errors.js';
import {
  SCHEMA_SQL,
  countRowSchema,
  positionRowSchema,
  positionViewRowSchema,
  tokenRowSchema,
  tradeLogRowSchema,
  tradeRowSchema,
  tradingStatsRowSchema,
  walletRowSchema,
} from './journal.schema.js';
import type { TokenIdentity, NewTradeRecord, TradeLogEntry, TradeRecord } from '../../types/trade.js';
import type {
  PositionRecord,
  PositionStatus,
  PositionUpdate,
  PositionView,
  TradingStats,
} from '../../types/position.js';
import type { TokenRecord, WalletRecord } from '../../types/token.js';

const POSITION_VIEW_SELECT = `
  SELECT p.*, t.address AS token_address, t.chain AS chain, t.symbol AS symbol,
         w.nickname AS wallet_nickname
  FROM positions p
  JOIN tokens t ON t.id = p.token_id
  LEFT JOIN wallets w ON w.id = p.wallet_id
`;

function toIso(date: Date): string {
  return date.toISOString();
}

function parseRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, row: unknown): T {
  return schema.parse(row);
}

function parseOptional<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, row: unknown): T | null {
  return row === undefined ? null : schema.parse(row);
}

function canonicalAddress(address: string, chain: string): string {
  const family = familyOf(chain);
  return family ? normalizeAddress(address, family) : address.trim();
}

/**
 * SQLite-backed journal. Every method is synchronous; callers that need
 * several writes to land together wrap them in `transaction`.
 */
export class JournalStore {
  readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.migrate();
  }

  private migrate(): void {
    this.guard('initialise schema', () => {
      this.db.pragma('foreign_keys = ON');
      this.db.exec(SCHEMA_SQL);
    });
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (isJournalError(err)) throw err;
      throw new PersistenceError(operation, err);
    }
  }

  /** Runs `fn` in one SQLite transaction; any throw rolls everything back. */
  transaction<T>(fn: () => T): T {
    return this.guard('commit transaction', () => this.db.transaction(fn)());
  }

  ping(): boolean {
    return this.guard('ping database', () => {
      const row = this.db.prepare('SELECT 1 AS count').get();
      return countRowSchema.parse(row).count === 1;
    });
  }

  close(): void {
    this.db.close();
  }

  // --- Tokens ---

  findToken(address: string, chain: string): TokenRecord | null {
    return this.guard('find token', () =>
      parseOptional(
        tokenRowSchema,
        this.db
          .prepare('SELECT * FROM tokens WHERE address = ? AND chain = ?')
          .get(canonicalAddress(address, chain), chain),
      ),
    );
  }

  getToken(id: number): TokenRecord | null {
    return this.guard('load token', () =>
      parseOptional(tokenRowSchema, this.db.prepare('SELECT * FROM tokens WHERE id = ?').get(id)),
    );
  }

  /** Oldest token with this address on any EVM chain, including the open family. */
  findEvmToken(address: string): TokenRecord | null {
    return this.guard('find token', () => {
      const rows = this.db
        .prepare('SELECT * FROM tokens WHERE address = ? ORDER BY id')
        .all(normalizeAddress(address, 'evm-like'));
      const match = rows
        .map((row) => parseRow(tokenRowSchema, row))
        .find((token) => token.chain === 'evm-like' || isEvmChain(token.chain));
      return match ?? null;
    });
  }

  /**
   * Resolves the token a trade refers to, creating it on first sight. An
   * EVM address without a concrete chain reuses the token on whichever EVM
   * chain already holds it, and a concrete EVM chain reuses a token that was
   * first recorded without one. Missing symbol and name are filled in.
   */
  getOrCreateToken(identity: TokenIdentity): TokenRecord {
    return this.guard('resolve token', () => {
      const address = canonicalAddress(identity.address, identity.chain);

      let existing = this.findToken(address, identity.chain);
      if (!existing && identity.chain === 'evm-like') {
        existing = this.findEvmToken(address);
      }
      if (!existing && isEvmChain(identity.chain)) {
        existing = this.findToken(address, 'evm-like');
      }

      if (existing) {
        return this.backfillToken(existing, identity);
      }

      const result = this.db
        .prepare(
          'INSERT INTO tokens (address, chain, symbol, name, created_at) VALUES (?, ?, ?, ?, ?)',
        )
        .run(address, identity.chain, identity.symbol, identity.name, toIso(new Date()));

      const created = this.getToken(Number(result.lastInsertRowid));
      if (!created) throw new Error('inserted token not found');
      return created;
    });
  }

  private backfillToken(token: TokenRecord, identity: TokenIdentity): TokenRecord {
    const symbol = token.symbol ?? identity.symbol;
    const name = token.name ?? identity.name;
    if (symbol === token.symbol && name === token.name) return token;

    this.db.prepare('UPDATE tokens SET symbol = ?, name = ? WHERE id = ?').run(symbol, name, token.id);
    return { ...token, symbol, name };
  }

  // --- Wallets ---

  findWallet(address: string, chain: string): WalletRecord | null {
    return this.guard('find wallet', () =>
      parseOptional(
        walletRowSchema,
        this.db
          .prepare('SELECT * FROM wallets WHERE address = ? AND chain = ?')
          .get(canonicalAddress(address, chain), chain),
      ),
    );
  }

  findWalletByNickname(nickname: string): WalletRecord | null {
    return this.guard('find wallet', () =>
      parseOptional(
        walletRowSchema,
        this.db.prepare('SELECT * FROM wallets WHERE nickname = ? COLLATE NOCASE').get(nickname),
      ),
    );
  }

  getWallet(id: number): WalletRecord | null {
    return this.guard('load wallet', () =>
      parseOptional(walletRowSchema, this.db.prepare('SELECT * FROM wallets WHERE id = ?').get(id)),
    );
  }

  /** Oldest wallet with this address on any EVM chain, including the open family. */
  findEvmWallet(address: string): WalletRecord | null {
    return this.guard('find wallet', () => {
      const rows = this.db
        .prepare('SELECT * FROM wallets WHERE address = ? ORDER BY id')
        .all(normalizeAddress(address, 'evm-like'));
      const match = rows
        .map((row) => parseRow(walletRowSchema, row))
        .find((wallet) => wallet.chain === 'evm-like' || isEvmChain(wallet.chain));
      return match ?? null;
    });
  }

  /** An EVM address is the same wallet on every EVM chain; the oldest row wins. */
  findOwnedWallet(address: string, chain: string): WalletRecord | null {
    return familyOf(chain) === 'evm-like'
      ? this.findEvmWallet(address)
      : this.findWallet(address, chain);
  }

  getOrCreateWallet(address: string, chain: string): WalletRecord {
    return this.guard('resolve wallet', () => {
      const existing = this.findOwnedWallet(address, chain);
      if (existing) return existing;

      const result = this.db
        .prepare('INSERT INTO wallets (address, chain, nickname, created_at) VALUES (?, ?, NULL, ?)')
        .run(canonicalAddress(address, chain), chain, toIso(new Date()));

      const created = this.getWallet(Number(result.lastInsertRowid));
      if (!created) throw new Error('inserted wallet not found');
      return created;
    });
  }

  /** Registers a wallet, or renames it when it already exists. */
  saveWallet(address: string, chain: string, nickname: string | null): WalletRecord {
    return this.transaction(() => {
      const wallet = this.getOrCreateWallet(address, chain);
      if (wallet.nickname === nickname) return wallet;

      this.db.prepare('UPDATE wallets SET nickname = ? WHERE id = ?').run(nickname, wallet.id);
      return { ...wallet, nickname };
    });
  }

  listWallets(): WalletRecord[] {
    return this.guard('list wallets', () =>
      this.db
        .prepare('SELECT * FROM wallets ORDER BY id')
        .all()
        .map((row) => parseRow(walletRowSchema, row)),
    );
  }

  // --- Positions ---

  createPosition(tokenId: number, walletId: number | null, openedAt: Date): PositionRecord {
    return this.guard('create position', () => {
      const now = toIso(new Date());
      const result = this.db
        .prepare(
          `INSERT INTO positions (token_id, wallet_id, status, opened_at, created_at)
           VALUES (?, ?, 'OPEN', ?, ?)`,
        )
        .run(tokenId, walletId, toIso(openedAt), now);

      const created = this.getPosition(Number(result.lastInsertRowid));
      if (!created) throw new Error('inserted position not found');
      return created;
    });
  }

  getPosition(id: number): PositionRecord | null {
    return this.guard('load position', () =>
      parseOptional(
        positionRowSchema,
        this.db.prepare('SELECT * FROM positions WHERE id = ?').get(id),
      ),
    );
  }

  getPositionView(id: number): PositionView | null {
    return this.guard('load position', () =>
      parseOptional(
        positionViewRowSchema,
        this.db.prepare(`${POSITION_VIEW_SELECT} WHERE p.id = ?`).get(id),
      ),
    );
  }

  findOpenPosition(tokenId: number, walletId: number | null): PositionRecord | null {
    return this.guard('find open position', () =>
      parseOptional(
        positionRowSchema,
        this.db
          .prepare(
            `SELECT * FROM positions
             WHERE token_id = ? AND wallet_id IS ? AND status IN ('OPEN', 'PARTIAL')
             ORDER BY id DESC LIMIT 1`,
          )
          .get(tokenId, walletId),
      ),
    );
  }

  /**
   * Compare-and-set on `version`. Returns false when another writer got
   * there first; the caller re-reads and retries.
   */
  updatePosition(id: number, expectedVersion: number, update: PositionUpdate): boolean {
    return this.guard('update position', () => {
      const result = this.db
        .prepare(
          `UPDATE positions SET
             status = @status,
             total_bought = @totalBought,
             total_sold = @totalSold,
             remaining_tokens = @remainingTokens,
             total_cost_usd = @totalCostUsd,
             total_proceeds_usd = @totalProceedsUsd,
             realized_pnl_usd = @realizedPnlUsd,
             closed_at = @closedAt,
             version = version + 1
           WHERE id = @id AND version = @expectedVersion`,
        )
        .run({
          id,
          expectedVersion,
          status: update.status,
          totalBought: update.totalBought,
          totalSold: update.totalSold,
          remainingTokens: update.remainingTokens,
          totalCostUsd: update.totalCostUsd,
          totalProceedsUsd: update.totalProceedsUsd,
          realizedPnlUsd: update.realizedPnlUsd,
          closedAt: update.closedAt ? toIso(update.closedAt) : null,
        });
      return result.changes === 1;
    });
  }

  listPositions(status?: PositionStatus): PositionView[] {
    return this.guard('list positions', () => {
      const rows = status
        ? this.db.prepare(`${POSITION_VIEW_SELECT} WHERE p.status = ? ORDER BY p.id`).all(status)
        : this.db.prepare(`${POSITION_VIEW_SELECT} ORDER BY p.id`).all();
      return rows.map((row) => parseRow(positionViewRowSchema, row));
    });
  }

  listOpenPositions(): PositionView[] {
    return this.guard('list open positions', () =>
      this.db
        .prepare(`${POSITION_VIEW_SELECT} WHERE p.status IN ('OPEN', 'PARTIAL') ORDER BY p.id`)
        .all()
        .map((row) => parseRow(positionViewRowSchema, row)),
    );
  }

  // --- Trades (append-only) ---

  insertTrade(trade: NewTradeRecord): TradeRecord {
    return this.guard('record trade', () => {
      const result = this.db
        .prepare(
          `INSERT INTO trades (
             token_id, wallet_id, position_id, direction, amount_spent, spend_currency,
             amount_tokens, price_usd, total_value_usd, market_cap_at_trade,
             source_message, notes_url, dex_screener_url, trade_timestamp, created_at
           ) VALUES (
             @tokenId, @walletId, @positionId, @direction, @amountSpent, @spendCurrency,
             @amountTokens, @priceUsd, @totalValueUsd, @marketCapAtTrade,
             @sourceMessage, @notesUrl, @dexScreenerUrl, @tradeTimestamp, @createdAt
           )`,
        )
        .run({
          ...trade,
          tradeTimestamp: toIso(trade.tradeTimestamp),
          createdAt: toIso(new Date()),
        });

      const created = parseOptional(
        tradeRowSchema,
        this.db.prepare('SELECT * FROM trades WHERE id = ?').get(result.lastInsertRowid),
      );
      if (!created) throw new Error('inserted trade not found');
      return created;
    });
  }

  listTradesForPosition(positionId: number): TradeRecord[] {
    return this.guard('list trades', () =>
      this.db
        .prepare('SELECT * FROM trades WHERE position_id = ? ORDER BY trade_timestamp, id')
        .all(positionId)
        .map((row) => parseRow(tradeRowSchema, row)),
    );
  }

  /** Most recent first, with the token and position status joined in. */
  listRecentTrades(limit: number): TradeLogEntry[] {
    return this.guard('list trades', () =>
      this.db
        .prepare(
          `SELECT tr.*, t.symbol AS symbol, t.chain AS chain, t.address AS token_address,
                  p.status AS position_status
           FROM trades tr
           JOIN tokens t ON t.id = tr.token_id
           LEFT JOIN positions p ON p.id = tr.position_id
           ORDER BY tr.trade_timestamp DESC, tr.id DESC
           LIMIT ?`,
        )
        .all(limit)
        .map((row) => parseRow(tradeLogRowSchema, row)),
    );
  }

  countTrades(): number {
    return this.guard('count trades', () =>
      countRowSchema.parse(this.db.prepare('SELECT COUNT(*) AS count FROM trades').get()).count,
    );
  }

  getTradingStats(): TradingStats {
    return this.guard('compute trading stats', () => {
      const row = tradingStatsRowSchema.parse(
        this.db
          .prepare(
            `SELECT
               (SELECT COUNT(*) FROM trades) AS total_trades,
               (SELECT COUNT(*) FROM positions) AS total_positions,
               (SELECT COUNT(*) FROM positions WHERE status IN ('OPEN', 'PARTIAL')) AS open_positions,
               (SELECT COALESCE(SUM(realized_pnl_usd), 0) FROM positions) AS realized_pnl_usd,
               (SELECT COALESCE(SUM(total_value_usd), 0) FROM trades
                 WHERE direction = 'BUY' AND amount_tokens IS NOT NULL)
                 AS total_invested_usd`,
          )
          .get(),
      );
      return {
        totalTrades: row.total_trades,
        totalPositions: row.total_positions,
        openPositions: row.open_positions,
        realizedPnlUsd: row.realized_pnl_usd,
        totalInvestedUsd: row.total_invested_usd,
      };
    });
  }
}
