export { PriceEnrichmentService, pickBestPair } from './price-enrichment.service.js';
export type { FetchFn, PriceEnrichmentDeps } from './price-enrichment.service.js';
export { RedisPriceCache, priceCacheKey } from './price-cache.js';
export type { PriceCache } from './price-cache.js';
