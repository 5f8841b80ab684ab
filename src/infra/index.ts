export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
export { createRedisClient } from './redis.js';
export type { RedisClient } from './redis.js';
export { createJournalStore } from './database.js';
export type { Container } from './container.js';
