export { PositionTracker, tokenLabel } from './position-tracker.service.js';
export type { PositionUpdateResult } from './position-tracker.service.js';
export { applyBuy, applySell, averageCost, deriveStatus } from './position-math.js';
