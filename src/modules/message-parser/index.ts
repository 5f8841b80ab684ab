export { parseMessage, formatParseSummary } from './message-parser.js';
export type { ParseResult, ParseFailure, ParseFailureCode } from './message-parser.js';
