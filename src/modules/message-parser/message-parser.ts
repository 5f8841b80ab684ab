import {
  detectChain,
  isEvmChain,
  normalizeAddress,
  normalizeChainName,
  familyOf,
} from '../chain-detector/index.js';
import { extract } from '../pattern-extractor/index.js';
import type { RawFields } from '../pattern-extractor/index.js';
import { isUsdPegged } from '../../types/trade.js';
import type { TradeIntent } from '../../types/trade.js';
import type { ChainConfidence, ResolvedChain } from '../../types/chain.js';
import { formatCompactUsd, formatNumber, formatUsd, shortAddress } from '../../services/format.js';

export type ParseFailureCode = 'EmptyMessage' | 'AmbiguousDirection' | 'NoAddressFound';

export interface ParseFailure {
  code: ParseFailureCode;
  message: string;
}

export type ParseResult =
  | { success: true; intent: TradeIntent }
  | { success: false; failure: ParseFailure };

interface ResolvedToken {
  address: string;
  chain: ResolvedChain;
  confidence: ChainConfidence;
}

const FAILURE_MESSAGES: Record<ParseFailureCode, string> = {
  EmptyMessage: 'The message is empty.',
  AmbiguousDirection:
    'Could not tell whether this was a buy or a sell. Include a word like "bought" or "sold".',
  NoAddressFound:
    'No token address found. Paste the contract address or a DEX Screener link.',
};

function fail(code: ParseFailureCode): ParseResult {
  return { success: false, failure: { code, message: FAILURE_MESSAGES[code] } };
}

function fromDexLink(fields: RawFields): ResolvedToken | null {
  if (!fields.dexUrl) return null;

  const chain = normalizeChainName(fields.dexUrl.chainSlug);
  if (!chain) return null;

  const family = familyOf(chain);
  const guess = detectChain(fields.dexUrl.address);
  if (!family || guess.kind !== family) return null;

  return {
    address: normalizeAddress(fields.dexUrl.address, family),
    chain,
    confidence: 'high',
  };
}

function fromBareAddress(fields: RawFields): ResolvedToken | null {
  if (!fields.address) return null;

  const guess = detectChain(fields.address);
  switch (guess.kind) {
    case 'evm-like': {
      const address = normalizeAddress(fields.address, 'evm-like');
      const hint = fields.chainHint;
      if (hint && isEvmChain(hint)) {
        return { address, chain: hint, confidence: 'medium' };
      }
      return { address, chain: 'evm-like', confidence: 'low' };
    }
    case 'solana':
      return {
        address: normalizeAddress(fields.address, 'solana'),
        chain: 'solana',
        confidence: 'medium',
      };
    case 'unknown':
      return null;
  }
}

function resolveTokenAmount(fields: RawFields): { amount: number | null; deferred: boolean } {
  if (fields.tokenAmount !== undefined) {
    return { amount: fields.tokenAmount, deferred: false };
  }
  if (fields.spend && isUsdPegged(fields.spend.currency) && fields.priceUsd !== undefined) {
    return { amount: fields.spend.amount / fields.priceUsd, deferred: false };
  }
  return { amount: null, deferred: fields.spend !== undefined };
}

/**
 * Turns one chat message into a trade intent. Pure: the same text always
 * gives the same result and nothing outside the process is touched.
 */
export function parseMessage(rawText: string | null | undefined): ParseResult {
  if (rawText === null || rawText === undefined || rawText.trim().length === 0) {
    return fail('EmptyMessage');
  }

  const fields = extract(rawText);

  if (!fields.direction) {
    return fail('AmbiguousDirection');
  }

  const token = fromDexLink(fields) ?? fromBareAddress(fields);
  if (!token) {
    return fail('NoAddressFound');
  }

  const tokens = resolveTokenAmount(fields);

  return {
    success: true,
    intent: {
      direction: fields.direction.direction,
      chain: token.chain,
      chainConfidence: token.confidence,
      address: token.address,
      spend: fields.spend ?? null,
      marketCap: fields.marketCap ?? null,
      priceUsd: fields.priceUsd ?? null,
      amountTokens: tokens.amount,
      amountTokensDeferred: tokens.deferred,
      symbolHint: fields.symbol ?? null,
      walletTag: fields.walletTag ?? null,
      dexUrl: fields.dexUrl?.url ?? null,
      notesUrl: fields.notesUrl ?? null,
      rawText,
    },
  };
}

export function formatParseSummary(result: ParseResult): string {
  if (!result.success) {
    return `Could not parse message: ${result.failure.message}`;
  }

  const { intent } = result;
  const sign = intent.direction === 'BUY' ? '+' : '-';
  const lines = [`${sign} ${intent.direction}${intent.symbolHint ? ` ${intent.symbolHint}` : ''}`];

  lines.push(
    `  Token: ${shortAddress(intent.address)} (${intent.chain}, ${intent.chainConfidence} confidence)`,
  );

  if (intent.spend) {
    lines.push(`  Amount: ${formatNumber(intent.spend.amount)} ${intent.spend.currency}`);
  }
  if (intent.amountTokens !== null) {
    lines.push(`  Tokens: ${formatNumber(intent.amountTokens)}`);
  } else if (intent.amountTokensDeferred) {
    lines.push('  Tokens: pending price lookup');
  }
  if (intent.priceUsd !== null) {
    lines.push(`  Price: ${formatUsd(intent.priceUsd, 8)}`);
  }
  if (intent.marketCap !== null) {
    lines.push(`  Entry MCAP: ${formatCompactUsd(intent.marketCap)}`);
  }
  if (intent.walletTag) {
    lines.push(`  Wallet: ${intent.walletTag}`);
  }

  return lines.join('\n');
}
