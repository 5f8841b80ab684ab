export { JournalStore } from './journal.store.js';
