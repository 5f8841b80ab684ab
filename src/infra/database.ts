import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { JournalStore } from '../modules/journal-store/journal.store.js';
import type { Logger } from './logger.js';

export function createJournalStore(file: string, logger: Logger): JournalStore {
  if (file !== ':memory:') {
    fs.mkdirSync(path.dirname(file), { recursive: true });
  }

  const db = new Database(file);
  if (file !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }

  const store = new JournalStore(db);
  logger.info({ path: file }, 'Journal database ready');
  return store;
}
