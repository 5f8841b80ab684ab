export { detectChain, normalizeChainName, normalizeAddress, isEvmChain, familyOf } from './chain-detector.js';
