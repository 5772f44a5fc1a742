/**
 * Express REST API Server
 * Serves the news item endpoints over a single SQLite-backed store
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import { createServer, type Server as HttpServer } from 'http';
import type { DatabaseManager } from '../storage/sqlite.js';
import { NewsStore } from '../storage/news-store.js';
import { createNewsRouter } from './routes/news.js';
import { errorHandler, notFoundHandler } from './errors.js';

// ============================================
// Types
// ============================================

export interface ServerConfig {
  port: number;
  host: string;
  apiKey: string;
  apiKeyHeader: string;
  corsOrigins: readonly string[];
  logRequests: boolean;
}

// ============================================
// API Server
// ============================================

export class ApiServer {
  private app: Express;
  private server: HttpServer;
  private config: ServerConfig;
  private store: NewsStore;

  constructor(private readonly database: DatabaseManager, config: ServerConfig) {
    this.config = { ...config };
    this.store = new NewsStore(database);

    this.app = express();
    this.app.disable('x-powered-by');
    this.server = createServer(this.app);

    this.setupMiddleware();
    this.setupRoutes();
  }

  // ----------------------------------------
  // Middleware
  // ----------------------------------------

  private setupMiddleware(): void {
    if (this.config.corsOrigins.length > 0) {
      this.app.use(cors({
        origin: [...this.config.corsOrigins],
      }));
    }

    if (this.config.logRequests) {
      this.app.use((req: Request, res: Response, next: NextFunction) => {
        const startTime = Date.now();
        res.on('finish', () => {
          console.log(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startTime}ms`);
        });
        next();
      });
    }
  }

  // ----------------------------------------
  // Routes
  // ----------------------------------------

  private setupRoutes(): void {
    // Health check
    this.app.get('/health', (_req: Request, res: Response) => {
      if (!this.database.isInitialized()) {
        return res.status(503).json({ error: 'Database not initialized' });
      }

      res.json({ status: 'ok', items: this.store.count(), timestamp: Date.now() });
    });

    this.app.use('/items', createNewsRouter({
      store: this.store,
      auth: { apiKey: this.config.apiKey, header: this.config.apiKeyHeader },
    }));

    this.app.use(notFoundHandler());
    this.app.use(errorHandler());
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', reject);
        console.log(`API server running at http://${this.config.host}:${this.getPort()}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.server.listening) {
      return;
    }

    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Express app, for mounting or in-process testing
   */
  getApp(): Express {
    return this.app;
  }

  /**
   * Bound port once listening (resolves port 0), otherwise the configured one
   */
  getPort(): number {
    const address = this.server.address();
    if (address !== null && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }
}
