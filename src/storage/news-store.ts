/**
 * News Store
 * Persistence layer for news items. Each call is one scoped unit of work.
 */

import { z } from 'zod';
import { NEWS_ITEMS_TABLE, type DatabaseManager } from './sqlite.js';
import type { NewsItem, NewsItemInput, NewsItemRow } from '../types/index.js';

// ============================================
// Row Mapping
// ============================================

const newsItemRowSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  body: z.string(),
  date: z.string(),
  category: z.string(),
});

/**
 * Convert a row read from news_items into a NewsItem
 */
export function rowToNewsItem(row: unknown): NewsItem {
  const parsed: NewsItemRow = newsItemRowSchema.parse(row);
  return {
    id: parsed.id,
    title: parsed.title,
    body: parsed.body,
    date: parsed.date,
    category: parsed.category,
  };
}

/**
 * Positional bind values for the four writable columns
 */
export function inputToRow(input: NewsItemInput): [string, string, string, string] {
  return [input.title, input.body, input.date, input.category];
}

// ============================================
// News Store
// ============================================

const COLUMNS = 'id, title, body, date, category';

export class NewsStore {
  constructor(private readonly db: DatabaseManager) {}

  /**
   * All news items in ascending id order
   */
  listAll(): NewsItem[] {
    return this.db.transaction(() => {
      const rows = this.db.prepare(`
        SELECT ${COLUMNS} FROM ${NEWS_ITEMS_TABLE} ORDER BY id
      `).all();
      return rows.map(rowToNewsItem);
    });
  }

  getById(id: number): NewsItem | null {
    return this.db.transaction(() => {
      const row = this.db.prepare(`
        SELECT ${COLUMNS} FROM ${NEWS_ITEMS_TABLE} WHERE id = ?
      `).get(id);
      return row === undefined ? null : rowToNewsItem(row);
    });
  }

  /**
   * Insert a new item; the store assigns the id
   */
  insert(input: NewsItemInput): NewsItem {
    return this.db.transaction(() => {
      const row = this.db.prepare(`
        INSERT INTO ${NEWS_ITEMS_TABLE} (title, body, date, category)
        VALUES (?, ?, ?, ?)
        RETURNING ${COLUMNS}
      `).get(...inputToRow(input));
      return rowToNewsItem(row);
    });
  }

  /**
   * Replace all four fields of an existing item.
   * Returns null (and changes nothing) when the id is absent.
   */
  replace(id: number, input: NewsItemInput): NewsItem | null {
    return this.db.transaction(() => {
      const row = this.db.prepare(`
        UPDATE ${NEWS_ITEMS_TABLE}
        SET title = ?, body = ?, date = ?, category = ?
        WHERE id = ?
        RETURNING ${COLUMNS}
      `).get(...inputToRow(input), id);
      return row === undefined ? null : rowToNewsItem(row);
    });
  }

  deleteById(id: number): boolean {
    return this.db.transaction(() => {
      const result = this.db.prepare(`
        DELETE FROM ${NEWS_ITEMS_TABLE} WHERE id = ?
      `).run(id);
      return result.changes > 0;
    });
  }

  count(): number {
    return this.db.transaction(() => {
      const row = this.db.prepare(`
        SELECT COUNT(*) AS total FROM ${NEWS_ITEMS_TABLE}
      `).get();
      return z.object({ total: z.number() }).parse(row).total;
    });
  }
}
