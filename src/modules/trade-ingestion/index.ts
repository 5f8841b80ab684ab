export { TradeIngestionService, finalizeTrade, formatParseFailure } from './trade-ingestion.service.js';
export type { PriceLookup } from './trade-ingestion.service.js';
export {
  formatPortfolio,
  formatPositionSummary,
  formatStatus,
  formatTradeLog,
  formatTradeReply,
} from './reply-format.js';
