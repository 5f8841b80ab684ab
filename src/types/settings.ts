/** Runtime knobs handed to services through the container. */
export interface JournalSettings {
  priceApiBaseUrl: string;
  priceLookupTimeoutMs: number;
  priceCacheTtlSeconds: number;
  positionUpdateMaxRetries: number;
  oversellTolerance: number;
  authorizedSenders: string[];
}
