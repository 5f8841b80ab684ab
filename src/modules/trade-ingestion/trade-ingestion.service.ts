import { randomUUID } from 'node:crypto';
import { detectChain, isEvmChain } from '../chain-detector/index.js';
import { parseMessage } from '../message-parser/index.js';
import { OrphanSellError, OversellError, PositionConflictError } from '../../services/errors.js';
import { isUsdPegged } from '../../types/trade.js';
import {
  HELP_TEXT,
  TRADE_LOG_LIMIT,
  WELCOME_TEXT,
  formatPortfolio,
  formatStatus,
  formatTradeLog,
  formatTradeReply,
} from './reply-format.js';
import type { StatusReport } from './reply-format.js';
import type { Container } from '../../infra/container.js';
import type { EventBus } from '../../services/event-bus.js';
import type { PositionTracker } from '../position-tracker/index.js';
import type { PriceEnrichmentService } from '../price-enrichment/index.js';
import type { ParseFailure } from '../message-parser/index.js';
import type { PendingTrade, TradeIntent, WalletIdentity } from '../../types/trade.js';
import type { PriceInfo, PriceLookupResult } from '../../types/price.js';

export type PriceLookup = Pick<PriceEnrichmentService, 'lookup'>;

type WalletResolution = { ok: true; wallet: WalletIdentity | null } | { ok: false; reply: string };

const PARSE_HINT = 'Please include a buy or sell word and a contract address or DEX Screener link.';

/**
 * Chat boundary. Takes one raw message, runs it through parsing, enrichment
 * and the position tracker, and returns the text to send back. Commands
 * starting with `/` are answered from the journal.
 */
export class TradeIngestionService {
  private readonly container: Container;
  private readonly eventBus: EventBus;
  private readonly prices: PriceLookup;
  private readonly tracker: PositionTracker;

  constructor(
    container: Container,
    eventBus: EventBus,
    prices: PriceLookup,
    tracker: PositionTracker,
  ) {
    this.container = container;
    this.eventBus = eventBus;
    this.prices = prices;
    this.tracker = tracker;
  }

  async handle(rawText: string, receivedAt: Date = new Date()): Promise<string> {
    const text = rawText.trim();
    if (text.startsWith('/')) {
      return this.handleCommand(text);
    }

    const parsed = parseMessage(rawText);
    if (!parsed.success) {
      this.reject(parsed.failure.code, parsed.failure.message);
      return formatParseFailure(parsed.failure);
    }

    const { intent } = parsed;
    const wallet = this.resolveWallet(intent);
    if (!wallet.ok) {
      this.reject('UnknownWallet', wallet.reply);
      return wallet.reply;
    }

    const warnings: string[] = [];
    const lookup = await this.enrich(intent, warnings);
    const pending = finalizeTrade(intent, lookup, wallet.wallet, receivedAt);

    if (pending.amountTokens === null || pending.totalValueUsd === null) {
      warnings.push('Token amount or USD value unknown; the trade is saved but position totals are unchanged.');
    }

    try {
      const result = await this.tracker.applyTrade(pending);
      return formatTradeReply(result, pending, warnings);
    } catch (err) {
      if (
        err instanceof OrphanSellError ||
        err instanceof OversellError ||
        err instanceof PositionConflictError
      ) {
        this.container.logger.warn(
          { code: err.code, address: pending.token.address, chain: pending.token.chain },
          'Trade rejected',
        );
        this.reject(err.code, err.message);
        return `Failed: ${err.message}`;
      }
      this.container.logger.error({ err, address: pending.token.address }, 'Trade could not be saved');
      throw err;
    }
  }

  private handleCommand(text: string): string {
    const command = (text.split(/\s+/)[0] ?? '').toLowerCase().replace(/@.*$/, '');
    const { db } = this.container;

    switch (command) {
      case '/start':
        return WELCOME_TEXT;
      case '/help':
        return HELP_TEXT;
      case '/status':
        return formatStatus(this.statusReport());
      case '/positions':
      case '/balance':
        return formatPortfolio(db.listOpenPositions(), db.getTradingStats());
      case '/log':
        return formatTradeLog(db.listRecentTrades(TRADE_LOG_LIMIT));
      default:
        return `Unknown command ${command}. Send /help for the list.`;
    }
  }

  private statusReport(): StatusReport {
    const { db, redis, logger } = this.container;
    const now = new Date();

    try {
      db.ping();
      return { database: { ok: true, stats: db.getTradingStats() }, priceCache: redis !== null, now };
    } catch (err) {
      logger.error({ err }, 'Database health check failed');
      const error = err instanceof Error ? err.message : String(err);
      return { database: { ok: false, error }, priceCache: redis !== null, now };
    }
  }

  /**
   * A wallet tag is either an address, registered on first use, or the
   * nickname of a wallet saved earlier.
   */
  private resolveWallet(intent: TradeIntent): WalletResolution {
    const tag = intent.walletTag;
    if (!tag) return { ok: true, wallet: null };

    const guess = detectChain(tag);
    switch (guess.kind) {
      case 'evm-like':
        return {
          ok: true,
          wallet: { address: tag, chain: isEvmChain(intent.chain) ? intent.chain : 'evm-like' },
        };
      case 'solana':
        return { ok: true, wallet: { address: tag, chain: 'solana' } };
      case 'unknown': {
        const saved = this.container.db.findWalletByNickname(tag);
        if (!saved) {
          return {
            ok: false,
            reply: `Unknown wallet "${tag}". Use its address, or register a nickname for it first.`,
          };
        }
        return { ok: true, wallet: { address: saved.address, chain: saved.chain } };
      }
    }
  }

  private async enrich(intent: TradeIntent, warnings: string[]): Promise<PriceLookupResult> {
    const lookup = await this.prices.lookup(intent.address, intent.chain);

    if (lookup.status !== 'found') {
      const reason = lookup.status === 'failed' ? lookup.reason : 'not-found';
      this.eventBus.emit({
        id: randomUUID(),
        type: 'ENRICHMENT_FAILED',
        timestamp: Date.now(),
        tokenAddress: intent.address,
        chain: intent.chain,
        reason,
      });
      warnings.push(
        lookup.status === 'failed'
          ? `price lookup failed (${lookup.reason}).`
          : 'token not found on DEX Screener.',
      );
    }

    return lookup;
  }

  private reject(code: string, reason: string): void {
    this.eventBus.emit({
      id: randomUUID(),
      type: 'TRADE_REJECTED',
      timestamp: Date.now(),
      code,
      reason,
    });
  }
}

export function formatParseFailure(failure: ParseFailure): string {
  return `Couldn't parse that message:\n${failure.message}\n\n${PARSE_HINT}`;
}

/**
 * Combines what the message said with what the price source knows. Values
 * written in the message win; the lookup only fills gaps. When both the
 * token amount and a USD spend are known the fill price is derived from
 * them, so `total = price × amount` holds for every stored trade.
 */
export function finalizeTrade(
  intent: TradeIntent,
  lookup: PriceLookupResult,
  wallet: WalletIdentity | null,
  tradeTimestamp: Date,
): PendingTrade {
  const info: PriceInfo | null = lookup.status === 'found' ? lookup.info : null;
  const usdSpend = intent.spend && isUsdPegged(intent.spend.currency) ? intent.spend.amount : null;

  let priceUsd = intent.priceUsd ?? info?.priceUsd ?? null;
  let amountTokens = intent.amountTokens;

  if (amountTokens === null && usdSpend !== null && priceUsd !== null && priceUsd > 0) {
    amountTokens = usdSpend / priceUsd;
  }
  if (amountTokens !== null && amountTokens > 0 && usdSpend !== null) {
    priceUsd = usdSpend / amountTokens;
  }

  let totalValueUsd: number | null = usdSpend;
  if (totalValueUsd === null && amountTokens !== null && priceUsd !== null) {
    totalValueUsd = amountTokens * priceUsd;
  }

  return {
    token: {
      address: info?.address ?? intent.address,
      chain: info?.chain ?? intent.chain,
      symbol: info?.symbol ?? intent.symbolHint,
      name: info?.name ?? null,
    },
    wallet,
    direction: intent.direction,
    amountSpent: intent.spend?.amount ?? null,
    spendCurrency: intent.spend?.currency ?? null,
    amountTokens,
    priceUsd,
    totalValueUsd,
    marketCapAtTrade: intent.marketCap ?? info?.marketCap ?? null,
    sourceMessage: intent.rawText,
    notesUrl: intent.notesUrl,
    dexScreenerUrl: intent.dexUrl ?? info?.dexUrl ?? null,
    tradeTimestamp,
  };
}
