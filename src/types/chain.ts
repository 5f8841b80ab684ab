export const EVM_CHAINS = [
  'ethereum',
  'base',
  'bsc',
  'arbitrum',
  'polygon',
  'optimism',
  'avalanche',
  'fantom',
  'zksync',
  'linea',
  'blast',
  'hyperliquid',
] as const;

export type EvmChain = (typeof EVM_CHAINS)[number];

export type ChainId = EvmChain | 'solana';

/**
 * Structural classification of an address. An EVM address is valid on every
 * EVM chain, so the detector only narrows it to the family.
 */
export type ChainGuess =
  | { kind: 'evm-like'; candidates: readonly EvmChain[] }
  | { kind: 'solana'; chain: 'solana' }
  | { kind: 'unknown' };

export type AddressFamily = Exclude<ChainGuess['kind'], 'unknown'>;

/** A concrete chain, or the EVM family when nothing narrowed it down. */
export type ResolvedChain = ChainId | 'evm-like';

export type ChainConfidence = 'high' | 'medium' | 'low';
