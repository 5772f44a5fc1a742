/**
 * Storage Module Exports
 */

export {
  DatabaseManager,
  openDatabase,
  MEMORY_PATH,
  NEWS_ITEMS_TABLE,
  type DatabaseConfig,
} from './sqlite.js';

export {
  NewsStore,
  rowToNewsItem,
  inputToRow,
} from './news-store.js';
