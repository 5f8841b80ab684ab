import { describe, it, expect } from 'vitest';
import { extract } from './pattern-extractor.js';
import { EXTRACTION_RULES, parseNumberWithSuffix, runRule } from './extraction-rules.js';
import { EmptyMessageError } from '../../services/errors.js';

const EVM = '0x20DD04c17AFD5c9a8b3f2cdacaa8Ee7907385BEF';
const MINT = '7GCihgDB8fe6KNjn2MYtkzZcRjQy3t9GHdC8uHYmW2hr';

function ruleNamed(name: string) {
  const rule = EXTRACTION_RULES.find((candidate) => candidate.name === name);
  if (!rule) throw new Error(`missing rule ${name}`);
  return rule;
}

describe('parseNumberWithSuffix', () => {
  it('applies K/M/B multipliers and strips separators', () => {
    expect(parseNumberWithSuffix('1.5', 'K')).toBe(1500);
    expect(parseNumberWithSuffix('1,500')).toBe(1500);
    expect(parseNumberWithSuffix('2', 'm')).toBe(2_000_000);
    expect(parseNumberWithSuffix('1.2', 'B')).toBeCloseTo(1_200_000_000, 3);
  });

  it('returns null for garbage', () => {
    expect(parseNumberWithSuffix(',')).toBeNull();
  });
});

describe('extraction rules', () => {
  it('reads a DEX Screener link as chain + address', () => {
    const matches = runRule(
      ruleNamed('dex-screener-url'),
      'look https://dexscreener.com/Base/0xabc123?maker=1 here',
    );
    expect(matches).toHaveLength(1);
    expect(matches[0]?.value).toEqual({
      url: 'https://dexscreener.com/base/0xabc123',
      chainSlug: 'base',
      address: '0xabc123',
    });
  });

  it('does not read a long English word as a mint', () => {
    expect(
      runRule(ruleNamed('solana-address'), 'Supercalifragilisticexpialidociousness').length,
    ).toBe(0);
    expect(runRule(ruleNamed('solana-address'), `mint ${MINT}`)[0]?.value).toBe(MINT);
  });

  it('does not cut an EVM address out of a longer hex string', () => {
    const txHash = `0x${'ab'.repeat(32)}`;
    expect(runRule(ruleNamed('evm-address'), txHash)).toHaveLength(0);
  });

  it('reads market cap before or after the figure', () => {
    expect(runRule(ruleNamed('market-cap-after-figure'), 'at $1.6M MCAP')[0]?.value).toBe(
      1_600_000,
    );
    expect(runRule(ruleNamed('market-cap-after-figure'), '500k mc')[0]?.value).toBe(500_000);
    expect(runRule(ruleNamed('market-cap-before-figure'), 'mcap: $2.5M')[0]?.value).toBe(
      2_500_000,
    );
  });

  it('treats the m of mcap as a word, not a million', () => {
    expect(runRule(ruleNamed('market-cap-after-figure'), '$500 mcap')[0]?.value).toBe(500);
  });

  it('reads per-token prices without a multiplier', () => {
    expect(runRule(ruleNamed('price-per-token'), 'bought at $0.10 each')[0]?.value).toBe(0.1);
    expect(runRule(ruleNamed('price-per-token'), '1000 tokens @ 0.002')[0]?.value).toBe(0.002);
    expect(runRule(ruleNamed('price-per-token'), 'filled at $0.25.')[0]?.value).toBe(0.25);
    expect(runRule(ruleNamed('price-per-token'), 'at $1.6M')).toHaveLength(0);
  });

  it('reads spends with a currency code', () => {
    expect(runRule(ruleNamed('currency-spend'), 'Bought 1.5K USDC worth')[0]?.value).toEqual({
      amount: 1500,
      currency: 'USDC',
    });
    expect(runRule(ruleNamed('currency-spend'), 'aped 2 bnb')[0]?.value).toEqual({
      amount: 2,
      currency: 'BNB',
    });
  });

  it('picks the earliest direction keyword', () => {
    const matches = runRule(ruleNamed('direction-keyword'), 'Sold half, entry was 1M');
    expect(matches[0]?.value).toEqual({ direction: 'SELL', keyword: 'sold' });
    expect(matches[1]?.value).toEqual({ direction: 'BUY', keyword: 'entry' });
  });

  it('understands multi-word sell phrases', () => {
    expect(runRule(ruleNamed('direction-keyword'), 'got  back $60')[0]?.value).toEqual({
      direction: 'SELL',
      keyword: 'got back',
    });
  });
});

describe('extract', () => {
  it('pulls every field out of a multi-line buy', () => {
    const fields = extract(`${EVM}

Bought 1.5K USDC worth of this at $1.6M MCAP

Thesis https://example.com/notes/native-thesis`);

    expect(fields.address).toBe(EVM);
    expect(fields.spend).toEqual({ amount: 1500, currency: 'USDC' });
    expect(fields.marketCap).toBeCloseTo(1_600_000, 3);
    expect(fields.direction?.direction).toBe('BUY');
    expect(fields.notesUrl).toBe('https://example.com/notes/native-thesis');
    expect(fields.priceUsd).toBeUndefined();
    expect(fields.dexUrl).toBeUndefined();
  });

  it('keeps market cap apart from the spend', () => {
    const fields = extract(`Bought $500 worth of PEPE at $1.2B MCAP\n${EVM}`);
    expect(fields.spend).toEqual({ amount: 500, currency: 'USD' });
    expect(fields.marketCap).toBeCloseTo(1_200_000_000, 3);
    expect(fields.symbol).toBe('PEPE');
    expect(fields.priceUsd).toBeUndefined();
  });

  it('does not read the address inside a DEX Screener link again', () => {
    const fields = extract(`aped $200 https://dexscreener.com/solana/${MINT}`);
    expect(fields.dexUrl?.chainSlug).toBe('solana');
    expect(fields.dexUrl?.address).toBe(MINT);
    expect(fields.address).toBeUndefined();
    expect(fields.notesUrl).toBeUndefined();
  });

  it('accepts fields in any order', () => {
    const fields = extract(`$80\nsold 500 tokens\n${EVM}`);
    expect(fields.direction?.direction).toBe('SELL');
    expect(fields.tokenAmount).toBe(500);
    expect(fields.spend).toEqual({ amount: 80, currency: 'USD' });
  });

  it('keeps a wallet tag out of the token address', () => {
    const wallet = '0x1111111111111111111111111111111111111111';
    const fields = extract(`wallet: ${wallet}\nbought $50 of ${EVM} on base`);
    expect(fields.walletTag).toBe(wallet);
    expect(fields.address).toBe(EVM);
    expect(fields.chainHint).toBe('base');
  });

  it('returns an empty bag when nothing matches', () => {
    expect(extract('gm frens')).toEqual({});
  });

  it('throws on empty input', () => {
    expect(() => extract('')).toThrow(EmptyMessageError);
    expect(() => extract('   \n ')).toThrow(EmptyMessageError);
    expect(() => extract(null)).toThrow(EmptyMessageError);
  });
});
