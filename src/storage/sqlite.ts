/**
 * SQLite Database Infrastructure
 * Manages the database connection, schema, and transactions for news items
 */

import Database, { type Database as DatabaseType, type Statement } from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';

// ============================================
// Types
// ============================================

export interface DatabaseConfig {
  /** Path to SQLite database file, or ":memory:" */
  path: string;
  /** Enable WAL mode for better concurrent access */
  walMode: boolean;
  /** Busy timeout in milliseconds */
  busyTimeout: number;
}

export const MEMORY_PATH = ':memory:';

// ============================================
// Schema
// ============================================

export const NEWS_ITEMS_TABLE = 'news_items';

const NEWS_ITEMS_SCHEMA = `
  CREATE TABLE IF NOT EXISTS ${NEWS_ITEMS_TABLE} (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL CHECK(length(title) BETWEEN 1 AND 255),
    body TEXT NOT NULL CHECK(length(body) >= 1),
    date TEXT NOT NULL,
    category TEXT NOT NULL CHECK(length(category) BETWEEN 1 AND 100)
  );
`;

// ============================================
// Database Manager
// ============================================

export class DatabaseManager {
  private db: DatabaseType | null = null;
  private config: DatabaseConfig;
  private preparedStatements = new Map<string, Statement>();

  constructor(config: Partial<DatabaseConfig> = {}) {
    this.config = {
      path: './data/news.db',
      walMode: true,
      busyTimeout: 5000,
      ...config,
    };
  }

  /**
   * Open the database connection and ensure the schema exists
   */
  initialize(): void {
    if (this.db) {
      return; // Already initialized
    }

    const inMemory = this.config.path === MEMORY_PATH;

    // Ensure directory exists
    const dbDir = dirname(this.config.path);
    if (!inMemory && dbDir && !existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
    }

    this.db = new Database(this.config.path);

    if (this.config.walMode && !inMemory) {
      this.db.pragma('journal_mode = WAL');
    }
    if (this.config.busyTimeout) {
      this.db.pragma(`busy_timeout = ${this.config.busyTimeout}`);
    }
    this.db.pragma('synchronous = NORMAL');

    this.ensureSchema();
  }

  /**
   * Create the news_items table if it is absent. Safe to call repeatedly.
   * Returns true when the table was created by this call.
   */
  ensureSchema(): boolean {
    const db = this.getDb();
    const existing = db.prepare(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?"
    ).get(NEWS_ITEMS_TABLE);

    if (existing) {
      return false;
    }

    db.exec(NEWS_ITEMS_SCHEMA);
    console.log(`Created table ${NEWS_ITEMS_TABLE}`);
    return true;
  }

  /**
   * Get the database connection
   */
  getDb(): DatabaseType {
    if (!this.db) {
      throw new Error('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  /**
   * Execute a function within a transaction.
   * Commits when fn returns, rolls back when it throws.
   */
  transaction<T>(fn: () => T): T {
    const db = this.getDb();
    return db.transaction(fn)();
  }

  /**
   * Get or create a prepared statement
   */
  prepare(sql: string): Statement {
    let stmt = this.preparedStatements.get(sql);
    if (!stmt) {
      stmt = this.getDb().prepare(sql);
      this.preparedStatements.set(sql, stmt);
    }
    return stmt;
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (!this.db) {
      return;
    }

    const db = this.db;
    this.preparedStatements.clear();
    this.db = null;

    try {
      if (this.config.walMode && this.config.path !== MEMORY_PATH) {
        db.pragma('wal_checkpoint(TRUNCATE)');
      }
    } finally {
      db.close();
    }
  }

  isInitialized(): boolean {
    return this.db !== null;
  }

  getPath(): string {
    return this.config.path;
  }
}

/**
 * Create and initialize a database for the given path
 */
export function openDatabase(config: Partial<DatabaseConfig> = {}): DatabaseManager {
  const manager = new DatabaseManager(config);
  manager.initialize();
  return manager;
}
