import {
  formatCompactAmount,
  formatCompactUsd,
  formatNumber,
  formatUsd,
  shortAddress,
} from '../../services/format.js';
import { tokenLabel } from '../position-tracker/index.js';
import { USD_PEGGED_CURRENCIES } from '../../types/trade.js';
import type { PositionUpdateResult } from '../position-tracker/index.js';
import type { PositionRecord, PositionView, TradingStats } from '../../types/position.js';
import type { PendingTrade, TradeLogEntry } from '../../types/trade.js';

const RULE = '─';
export const TRADE_LOG_LIMIT = 20;

export const WELCOME_TEXT = [
  'Welcome to your trade journal.',
  '',
  'Send a message describing a trade and it will be logged:',
  '• Bought $500 worth of $PEPE 0x...',
  '• $1.5K USDC on https://dexscreener.com/base/0x...',
  '• Sold 1M tokens of $WIF for $800',
  '',
  'Commands:',
  '/positions - Show open positions',
  '/log - Show trade history',
  '/status - Check the journal',
  '/help - Show examples',
].join('\n');

export const HELP_TEXT = [
  'Logging trades:',
  'Write the trade the way you would tell a friend. Include a buy or sell word',
  'and the token contract address or a DEX Screener link.',
  '',
  'Examples:',
  '• Bought 1K USDC of 0x4ed4... at 50M mcap',
  '• Aped 0.5 ETH into $TOSHI on base 0x...',
  '• Took profit on 2M tokens for $1,200 wallet: main',
  '• Sold everything 7GCi... @ $0.0042',
  '',
  'Amounts accept K/M/B suffixes. A price written as "@ $x" fills in the token',
  'amount; otherwise it is looked up on DEX Screener.',
  '',
  'Commands:',
  '/positions (or /balance) - Show open positions',
  '/log - Show the last 20 trades',
  '/status - Check the journal',
].join('\n');

function signedUsd(value: number): string {
  return value > 0 ? `+${formatUsd(value)}` : formatUsd(value);
}

function isPeggedCurrency(currency: string): boolean {
  return USD_PEGGED_CURRENCIES.some((pegged) => pegged === currency);
}

export function formatPositionSummary(position: PositionRecord, label: string): string {
  const lines = [`Position #${position.id}: ${label} (${position.status})`];

  if (position.remainingTokens > 0 && position.totalBought > 0) {
    const avgCost = position.totalCostUsd / position.totalBought;
    lines.push(`Holding: ${formatNumber(position.remainingTokens, 0)} tokens`);
    lines.push(`Avg cost: ${formatUsd(avgCost, 6)}`);
  }
  if (position.realizedPnlUsd !== 0) {
    lines.push(`Realized PnL: ${signedUsd(position.realizedPnlUsd)}`);
  }

  return lines.join('\n');
}

/** Confirmation sent back after a trade is recorded. */
export function formatTradeReply(
  result: PositionUpdateResult,
  pending: PendingTrade,
  warnings: string[] = [],
): string {
  const sign = pending.direction === 'BUY' ? '+' : '-';
  const label = tokenLabel(result.token);
  const lines = [`${sign} ${pending.direction} ${label} (${result.token.chain})`];

  if (pending.amountSpent !== null && pending.spendCurrency) {
    lines.push(
      isPeggedCurrency(pending.spendCurrency)
        ? `Spent: ${formatUsd(pending.amountSpent)} ${pending.spendCurrency}`
        : `Spent: ${formatNumber(pending.amountSpent, 4)} ${pending.spendCurrency}`,
    );
  }
  if (pending.amountTokens !== null) {
    lines.push(`Tokens: ${formatNumber(pending.amountTokens)}`);
  }
  if (pending.priceUsd !== null) {
    lines.push(`Price: ${formatUsd(pending.priceUsd, 8)}`);
  }
  if (pending.marketCapAtTrade !== null) {
    lines.push(`MCAP: ${formatCompactUsd(pending.marketCapAtTrade)}`);
  }
  if (result.realizedPnlDelta !== 0) {
    lines.push(`Trade PnL: ${signedUsd(result.realizedPnlDelta)}`);
  }

  lines.push('', formatPositionSummary(result.position, label));

  if (warnings.length > 0) {
    lines.push('', ...warnings.map((warning) => `Warning: ${warning}`));
  }

  return lines.join('\n');
}

export function formatPortfolio(positions: PositionView[], stats: TradingStats): string {
  if (positions.length === 0) return 'No open positions.';

  const lines = ['Open Positions', RULE.repeat(25)];
  let totalInvested = 0;

  for (const position of positions) {
    totalInvested += position.totalCostUsd;
    const label = position.symbol ?? shortAddress(position.tokenAddress);
    const wallet = position.walletNickname ? ` [${position.walletNickname}]` : '';
    lines.push(`• ${label} (${position.chain})${wallet}`);
    lines.push(
      `  ${formatCompactAmount(position.remainingTokens)} tokens | ${formatUsd(position.totalCostUsd, 0)} invested`,
    );
  }

  lines.push(RULE.repeat(25));
  lines.push(`Total invested: ${formatUsd(totalInvested, 0)}`);
  if (stats.realizedPnlUsd !== 0) {
    lines.push(`Realized PnL: ${signedUsd(stats.realizedPnlUsd)}`);
  }

  return lines.join('\n');
}

function logAmount(entry: TradeLogEntry): string {
  if (entry.amountSpent !== null && entry.spendCurrency && !isPeggedCurrency(entry.spendCurrency)) {
    return `${formatNumber(entry.amountSpent, 4)} ${entry.spendCurrency}`;
  }
  const usd = entry.amountSpent ?? entry.totalValueUsd ?? 0;
  return usd >= 1000 ? `$${(usd / 1000).toFixed(1)}K` : `$${usd.toFixed(0)}`;
}

function statusMark(status: string | null): string {
  if (status === 'CLOSED') return ' ✓';
  if (status === 'PARTIAL') return ' ◐';
  return '';
}

export function formatTradeLog(entries: TradeLogEntry[]): string {
  if (entries.length === 0) return 'No trades recorded yet.';

  const lines = [`Trade Log (last ${TRADE_LOG_LIMIT})`, RULE.repeat(30)];
  for (const entry of entries) {
    const date = entry.tradeTimestamp.toISOString().slice(0, 10);
    const label = entry.symbol ?? shortAddress(entry.tokenAddress);
    lines.push(
      `${entry.direction.padEnd(4)} ${date} | ${label} (${entry.chain}) | ${logAmount(entry)}${statusMark(entry.positionStatus)}`,
    );
  }
  lines.push(RULE.repeat(30));
  lines.push('✓ = closed | ◐ = partial');

  return lines.join('\n');
}

export interface StatusReport {
  database: { ok: true; stats: TradingStats } | { ok: false; error: string };
  priceCache: boolean;
  now: Date;
}

export function formatStatus(report: StatusReport): string {
  const lines = ['Journal Status', RULE.repeat(20)];

  if (report.database.ok) {
    const { stats } = report.database;
    lines.push(`Database: OK (${stats.totalTrades} trades)`);
    lines.push(`Positions: ${stats.openPositions} open of ${stats.totalPositions}`);
    lines.push(`Total invested: ${formatUsd(stats.totalInvestedUsd)}`);
  } else {
    lines.push(`Database: Error - ${report.database.error}`);
  }

  lines.push(`Price cache: ${report.priceCache ? 'Redis' : 'off'}`);
  lines.push(`Time: ${report.now.toISOString()}`);

  return lines.join('\n');
}
