export { JournalMetrics } from './journal-metrics.service.js';
export type { JournalMetricsSnapshot } from './journal-metrics.service.js';
