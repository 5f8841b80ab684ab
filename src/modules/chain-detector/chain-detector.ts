import { EVM_CHAINS } from '../../types/chain.js';
import type { AddressFamily, ChainGuess, ChainId, EvmChain } from '../../types/chain.js';

const EVM_ADDRESS = /^0x[0-9a-fA-F]{40}$/;
// Base58 excludes 0, O, I and l
const SOLANA_ADDRESS = /^[1-9A-HJ-NP-Za-km-z]{32,44}$/;

// DEX Screener slugs plus the shorthand people type in chat
const CHAIN_ALIASES: Record<string, ChainId> = {
  ethereum: 'ethereum',
  eth: 'ethereum',
  mainnet: 'ethereum',
  base: 'base',
  bsc: 'bsc',
  bnb: 'bsc',
  binance: 'bsc',
  arbitrum: 'arbitrum',
  arb: 'arbitrum',
  polygon: 'polygon',
  matic: 'polygon',
  optimism: 'optimism',
  op: 'optimism',
  avalanche: 'avalanche',
  avax: 'avalanche',
  fantom: 'fantom',
  ftm: 'fantom',
  zksync: 'zksync',
  linea: 'linea',
  blast: 'blast',
  hyperliquid: 'hyperliquid',
  hyperevm: 'hyperliquid',
  hl: 'hyperliquid',
  solana: 'solana',
  sol: 'solana',
};

export function detectChain(addressLike: string): ChainGuess {
  const candidate = addressLike.trim();

  if (EVM_ADDRESS.test(candidate)) {
    return { kind: 'evm-like', candidates: EVM_CHAINS };
  }

  if (!candidate.startsWith('0x') && SOLANA_ADDRESS.test(candidate)) {
    return { kind: 'solana', chain: 'solana' };
  }

  return { kind: 'unknown' };
}

export function normalizeChainName(alias: string): ChainId | null {
  return CHAIN_ALIASES[alias.trim().toLowerCase()] ?? null;
}

export function isEvmChain(chain: string): chain is EvmChain {
  return EVM_CHAINS.some((evm) => evm === chain);
}

export function familyOf(chain: string): AddressFamily | null {
  if (chain === 'solana') return 'solana';
  if (chain === 'evm-like' || isEvmChain(chain)) return 'evm-like';
  return null;
}

/** EVM addresses are case-insensitive hex; base58 is case-sensitive. */
export function normalizeAddress(address: string, family: AddressFamily): string {
  const trimmed = address.trim();
  return family === 'evm-like' ? trimmed.toLowerCase() : trimmed;
}
