import { randomUUID } from 'node:crypto';
import { familyOf, normalizeAddress } from '../chain-detector/index.js';
import { KeyedMutex } from '../../services/keyed-mutex.js';
import {
  OrphanSellError,
  OversellError,
  PositionConflictError,
} from '../../services/errors.js';
import { shortAddress } from '../../services/format.js';
import { applyBuy, applySell, deriveStatus, pickTotals } from './position-math.js';
import type { Container } from '../../infra/container.js';
import type { EventBus } from '../../services/event-bus.js';
import type { PendingTrade, TradeRecord } from '../../types/trade.js';
import type { PositionRecord } from '../../types/position.js';
import type { TokenRecord } from '../../types/token.js';

export interface PositionUpdateResult {
  trade: TradeRecord;
  position: PositionRecord;
  token: TokenRecord;
  opened: boolean;
  closed: boolean;
  /** False when the trade lacked a token amount or USD value. */
  applied: boolean;
  realizedPnlDelta: number;
}

function canonical(address: string, chain: string): string {
  const family = familyOf(chain);
  return family ? normalizeAddress(address, family) : address;
}

export function tokenLabel(token: Pick<TokenRecord, 'symbol' | 'address'>): string {
  return token.symbol ?? shortAddress(token.address);
}

export class PositionTracker {
  private readonly container: Container;
  private readonly eventBus: EventBus;
  private readonly locks = new KeyedMutex();

  constructor(container: Container, eventBus: EventBus) {
    this.container = container;
    this.eventBus = eventBus;
  }

  /**
   * Records a trade and folds it into the live position for its token and
   * wallet. Trade insert and position update commit together or not at all.
   */
  async applyTrade(pending: PendingTrade): Promise<PositionUpdateResult> {
    const { logger, settings } = this.container;

    return this.locks.run(this.lockKey(pending), async () => {
      for (let attempt = 1; ; attempt++) {
        try {
          const result = this.container.db.transaction(() => this.applyOnce(pending));
          this.publish(result);
          logger.info(
            {
              tradeId: result.trade.id,
              positionId: result.position.id,
              token: tokenLabel(result.token),
              direction: result.trade.direction,
              status: result.position.status,
              applied: result.applied,
              realizedPnlDelta: result.realizedPnlDelta,
            },
            'Trade recorded',
          );
          return result;
        } catch (err) {
          if (err instanceof PositionConflictError && attempt <= settings.positionUpdateMaxRetries) {
            logger.warn(
              { positionId: err.positionId, attempt },
              'Position changed underneath update, retrying',
            );
            continue;
          }
          throw err;
        }
      }
    });
  }

  private lockKey(pending: PendingTrade): string {
    const token = canonical(pending.token.address, pending.token.chain);
    const wallet = pending.wallet ? canonical(pending.wallet.address, pending.wallet.chain) : '-';
    return `${token}:${wallet}`;
  }

  private applyOnce(pending: PendingTrade): PositionUpdateResult {
    const { db, settings } = this.container;

    const token = db.getOrCreateToken(pending.token);
    const wallet = pending.wallet
      ? db.getOrCreateWallet(pending.wallet.address, pending.wallet.chain)
      : null;
    const walletId = wallet?.id ?? null;
    const existing = db.findOpenPosition(token.id, walletId);

    if (!existing && pending.direction === 'SELL') {
      throw new OrphanSellError(tokenLabel(token));
    }

    const position = existing ?? db.createPosition(token.id, walletId, pending.tradeTimestamp);
    let snapshot = position;
    let realizedPnlDelta = 0;
    const applied = pending.amountTokens !== null && pending.totalValueUsd !== null;

    if (pending.amountTokens !== null && pending.totalValueUsd !== null) {
      const current = pickTotals(position);
      let totals = current;

      if (pending.direction === 'BUY') {
        totals = applyBuy(current, pending.amountTokens, pending.totalValueUsd);
      } else {
        const outcome = applySell(
          current,
          pending.amountTokens,
          pending.totalValueUsd,
          settings.oversellTolerance,
        );
        if (!outcome.ok) {
          throw new OversellError(
            position.id,
            tokenLabel(token),
            pending.amountTokens,
            outcome.remaining,
          );
        }
        totals = outcome.totals;
        realizedPnlDelta = outcome.realizedPnlDelta;
      }

      const status = deriveStatus(totals);
      const closedAt = status === 'CLOSED' ? pending.tradeTimestamp : null;

      if (!db.updatePosition(position.id, position.version, { ...totals, status, closedAt })) {
        throw new PositionConflictError(position.id, position.version);
      }

      snapshot = { ...position, ...totals, status, closedAt, version: position.version + 1 };
    }

    const trade = db.insertTrade({
      tokenId: token.id,
      walletId,
      positionId: position.id,
      direction: pending.direction,
      amountSpent: pending.amountSpent,
      spendCurrency: pending.spendCurrency,
      amountTokens: pending.amountTokens,
      priceUsd: pending.priceUsd,
      totalValueUsd: pending.totalValueUsd,
      marketCapAtTrade: pending.marketCapAtTrade,
      sourceMessage: pending.sourceMessage,
      notesUrl: pending.notesUrl,
      dexScreenerUrl: pending.dexScreenerUrl,
      tradeTimestamp: pending.tradeTimestamp,
    });

    return {
      trade,
      position: snapshot,
      token,
      opened: !existing,
      closed: snapshot.status === 'CLOSED',
      applied,
      realizedPnlDelta,
    };
  }

  private publish(result: PositionUpdateResult): void {
    const timestamp = Date.now();

    this.eventBus.emit({
      id: randomUUID(),
      type: 'TRADE_RECORDED',
      timestamp,
      tradeId: result.trade.id,
      positionId: result.position.id,
      tokenAddress: result.token.address,
      chain: result.token.chain,
      direction: result.trade.direction,
      totalValueUsd: result.trade.totalValueUsd,
      applied: result.applied,
    });

    if (result.opened) {
      this.eventBus.emit({
        id: randomUUID(),
        type: 'POSITION_OPENED',
        timestamp,
        positionId: result.position.id,
        tokenId: result.token.id,
        realizedPnlUsd: result.position.realizedPnlUsd,
      });
    }

    if (result.closed) {
      this.eventBus.emit({
        id: randomUUID(),
        type: 'POSITION_CLOSED',
        timestamp,
        positionId: result.position.id,
        tokenId: result.token.id,
        realizedPnlUsd: result.position.realizedPnlUsd,
      });
    }
  }
}
