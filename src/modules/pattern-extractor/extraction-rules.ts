import { normalizeChainName } from '../chain-detector/chain-detector.js';
import { SPEND_CURRENCIES } from '../../types/trade.js';
import type { ChainId } from '../../types/chain.js';
import type { DexLink, SpendAmount, SpendCurrency, TradeDirection } from '../../types/trade.js';

export interface DirectionHit {
  direction: TradeDirection;
  keyword: string;
}

/** Best-effort bag of fields pulled out of a message. */
export interface RawFields {
  dexUrl?: DexLink;
  notesUrl?: string;
  walletTag?: string;
  address?: string;
  marketCap?: number;
  priceUsd?: number;
  tokenAmount?: number;
  spend?: SpendAmount;
  direction?: DirectionHit;
  chainHint?: ChainId;
  symbol?: string;
}

export type FieldName = keyof RawFields;

export interface ExtractionRule<K extends FieldName> {
  name: string;
  field: K;
  /** Must carry the `g` flag. */
  pattern: RegExp;
  convert(match: RegExpExecArray): NonNullable<RawFields[K]> | null;
}

export type AnyExtractionRule = { [K in FieldName]: ExtractionRule<K> }[FieldName];

export interface RuleMatch<T> {
  value: T;
  start: number;
  end: number;
}

const MULTIPLIERS: Record<string, number> = {
  K: 1_000,
  M: 1_000_000,
  B: 1_000_000_000,
};

// Digits with optional thousands separators and decimals
const NUM = String.raw`(\d[\d,]*(?:\.\d+)?|\.\d+)`;
// K/M/B multiplier, not the first letter of a word ("500 mcap", "2 BNB")
const SUFFIX = String.raw`(?:\s?([KkMmBb])(?![A-Za-z]))?`;
const CURRENCY = [...SPEND_CURRENCIES].sort((a, b) => b.length - a.length).join('|');

const BUY_KEYWORDS = new Set([
  'bought',
  'buy',
  'buying',
  'entered',
  'entry',
  'ape',
  'aped',
  'aping',
  'grabbed',
  'sniped',
  'sniping',
  'added',
  'accumulated',
  'longed',
]);

const SELL_KEYWORDS = new Set([
  'sold',
  'sell',
  'selling',
  'exit',
  'exited',
  'exiting',
  'got back',
  'took profit',
  'took profits',
  'tp',
  "tp'd",
  'dumped',
  'trimmed',
  'closed',
  'cashed out',
]);

const DIRECTION_PATTERN = new RegExp(
  String.raw`\b(` +
    [...BUY_KEYWORDS, ...SELL_KEYWORDS]
      .sort((a, b) => b.length - a.length)
      .map((keyword) => keyword.replace(/ /g, String.raw`\s+`))
      .join('|') +
    String.raw`)(?![\w'])`,
  'gi',
);

export function parseNumberWithSuffix(value: string, suffix?: string): number | null {
  const number = Number.parseFloat(value.replace(/,/g, ''));
  if (!Number.isFinite(number)) return null;
  if (!suffix) return number;
  return number * (MULTIPLIERS[suffix.toUpperCase()] ?? 1);
}

function isSpendCurrency(value: string): value is SpendCurrency {
  return SPEND_CURRENCIES.some((currency) => currency === value);
}

function positive(value: number | null): number | null {
  return value !== null && value > 0 ? value : null;
}

const dexScreenerUrl: ExtractionRule<'dexUrl'> = {
  name: 'dex-screener-url',
  field: 'dexUrl',
  pattern: /(?:https?:\/\/)?(?:www\.)?dexscreener\.com\/([a-z0-9_-]+)\/([a-z0-9]+)[^\s]*/gi,
  convert(match) {
    const [, slug, address] = match;
    if (!slug || !address) return null;
    const chainSlug = slug.toLowerCase();
    return { url: `https://dexscreener.com/${chainSlug}/${address}`, chainSlug, address };
  },
};

const notesUrl: ExtractionRule<'notesUrl'> = {
  name: 'notes-url',
  field: 'notesUrl',
  pattern: /https?:\/\/[^\s<>"{}|\\^`[\]]+/gi,
  convert(match) {
    return match[0].replace(/[).,;!?]+$/, '');
  },
};

const walletTag: ExtractionRule<'walletTag'> = {
  name: 'wallet-tag',
  field: 'walletTag',
  pattern: /\bwallet\s*[:=]\s*([^\s,;]+)/gi,
  convert(match) {
    return match[1] ?? null;
  },
};

const evmAddress: ExtractionRule<'address'> = {
  name: 'evm-address',
  field: 'address',
  pattern: /(?<![0-9A-Za-z])0x[0-9a-fA-F]{40}(?![0-9A-Za-z])/g,
  convert(match) {
    return match[0];
  },
};

const solanaAddress: ExtractionRule<'address'> = {
  name: 'solana-address',
  field: 'address',
  pattern: /(?<![0-9A-Za-z])[1-9A-HJ-NP-Za-km-z]{32,44}(?![0-9A-Za-z])/g,
  convert(match) {
    // A long run of letters is a word, not a mint
    return /^[A-Za-z]+$/.test(match[0]) ? null : match[0];
  },
};

const marketCapAfterFigure: ExtractionRule<'marketCap'> = {
  name: 'market-cap-after-figure',
  field: 'marketCap',
  pattern: new RegExp(
    String.raw`(?<![\w.])\$?\s*${NUM}${SUFFIX}\s*(?:mcap|mc|market\s*cap)\b`,
    'gi',
  ),
  convert(match) {
    return positive(parseNumberWithSuffix(match[1] ?? '', match[2]));
  },
};

const marketCapBeforeFigure: ExtractionRule<'marketCap'> = {
  name: 'market-cap-before-figure',
  field: 'marketCap',
  pattern: new RegExp(
    String.raw`\b(?:mcap|mc|market\s*cap)\b\s*(?:of|at|was|is|[:=@~])?\s*\$?\s*${NUM}${SUFFIX}`,
    'gi',
  ),
  convert(match) {
    return positive(parseNumberWithSuffix(match[1] ?? '', match[2]));
  },
};

const pricePerToken: ExtractionRule<'priceUsd'> = {
  name: 'price-per-token',
  field: 'priceUsd',
  pattern: new RegExp(
    String.raw`(?:@\s*\$?|\b(?:at|price)\b\s*[:=]?\s*\$)\s*${NUM}(?![\d,]|\.\d)(?!\s?[KkMmBb](?![A-Za-z]))`,
    'gi',
  ),
  convert(match) {
    return positive(parseNumberWithSuffix(match[1] ?? ''));
  },
};

const tokenQuantity: ExtractionRule<'tokenAmount'> = {
  name: 'token-quantity',
  field: 'tokenAmount',
  pattern: new RegExp(String.raw`(?<![\w.$])${NUM}${SUFFIX}\s*(?:tokens?|tkns?)\b`, 'gi'),
  convert(match) {
    return positive(parseNumberWithSuffix(match[1] ?? '', match[2]));
  },
};

const currencySpend: ExtractionRule<'spend'> = {
  name: 'currency-spend',
  field: 'spend',
  pattern: new RegExp(String.raw`(?<![\w.])\$?\s*${NUM}${SUFFIX}\s*(${CURRENCY})\b`, 'gi'),
  convert(match) {
    const amount = positive(parseNumberWithSuffix(match[1] ?? '', match[2]));
    const currency = (match[3] ?? '').toUpperCase();
    if (amount === null || !isSpendCurrency(currency)) return null;
    return { amount, currency };
  },
};

const dollarSpend: ExtractionRule<'spend'> = {
  name: 'dollar-spend',
  field: 'spend',
  pattern: new RegExp(String.raw`\$\s*${NUM}${SUFFIX}`, 'g'),
  convert(match) {
    const amount = positive(parseNumberWithSuffix(match[1] ?? '', match[2]));
    return amount === null ? null : { amount, currency: 'USD' };
  },
};

const directionKeyword: ExtractionRule<'direction'> = {
  name: 'direction-keyword',
  field: 'direction',
  pattern: DIRECTION_PATTERN,
  convert(match) {
    const keyword = (match[1] ?? '').toLowerCase().replace(/\s+/g, ' ');
    if (BUY_KEYWORDS.has(keyword)) return { direction: 'BUY', keyword };
    if (SELL_KEYWORDS.has(keyword)) return { direction: 'SELL', keyword };
    return null;
  },
};

const chainAfterOn: ExtractionRule<'chainHint'> = {
  name: 'chain-after-on',
  field: 'chainHint',
  pattern:
    /\bon\s+(ethereum|eth|mainnet|base|bsc|bnb|arbitrum|arb|polygon|matic|optimism|avalanche|avax|fantom|zksync|linea|blast|hyperliquid|hyperevm|hl|solana|sol)\b/gi,
  convert(match) {
    return normalizeChainName(match[1] ?? '');
  },
};

const chainFullName: ExtractionRule<'chainHint'> = {
  name: 'chain-full-name',
  field: 'chainHint',
  pattern: /\b(ethereum|solana|arbitrum|polygon|optimism|avalanche|hyperliquid|zksync)\b/gi,
  convert(match) {
    return normalizeChainName(match[1] ?? '');
  },
};

const cashtag: ExtractionRule<'symbol'> = {
  name: 'cashtag',
  field: 'symbol',
  pattern: /(?<![\w$])\$([A-Za-z][A-Za-z0-9]{1,9})\b/g,
  convert(match) {
    return (match[1] ?? '').toUpperCase() || null;
  },
};

const tickerAfterWorthOf: ExtractionRule<'symbol'> = {
  name: 'ticker-after-worth-of',
  field: 'symbol',
  pattern: /\bworth\s+of\s+\$?([A-Z][A-Z0-9]{1,9})\b/g,
  convert(match) {
    return match[1] ?? null;
  },
};

/**
 * Rules in priority order. A later rule never reads text an earlier rule
 * already claimed, so URLs beat bare addresses and market caps beat spends.
 */
export const EXTRACTION_RULES: readonly AnyExtractionRule[] = [
  dexScreenerUrl,
  notesUrl,
  walletTag,
  evmAddress,
  solanaAddress,
  marketCapAfterFigure,
  marketCapBeforeFigure,
  pricePerToken,
  tokenQuantity,
  currencySpend,
  dollarSpend,
  directionKeyword,
  chainAfterOn,
  chainFullName,
  cashtag,
  tickerAfterWorthOf,
];

export function runRule<K extends FieldName>(
  rule: ExtractionRule<K>,
  text: string,
): RuleMatch<NonNullable<RawFields[K]>>[] {
  const matches: RuleMatch<NonNullable<RawFields[K]>>[] = [];
  const pattern = new RegExp(rule.pattern.source, rule.pattern.flags);

  for (let match = pattern.exec(text); match !== null; match = pattern.exec(text)) {
    if (match[0].length === 0) {
      pattern.lastIndex += 1;
      continue;
    }
    const value = rule.convert(match);
    if (value !== null) {
      matches.push({ value, start: match.index, end: match.index + match[0].length });
    }
  }

  return matches;
}
