import type { RedisClient } from './redis.js';
import type { Logger } from './logger.js';
import type { JournalStore } from '../modules/journal-store/journal.store.js';
import type { JournalSettings } from '../types/settings.js';

export interface Container {
  logger: Logger;
  db: JournalStore;
  redis: RedisClient | null;
  settings: JournalSettings;
}
