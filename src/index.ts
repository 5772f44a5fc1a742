#!/usr/bin/env node
/**
 * News Items API - Main Entry Point
 * CLI for initializing the database and starting the server
 */

import { loadConfig, ConfigError, DEFAULT_PORT, DEFAULT_DB_PATH, type AppConfig } from './config.js';
import { ApiServer } from './server/index.js';
import { openDatabase } from './storage/index.js';

function printHelp(): void {
  console.log(`
News Items API - CRUD service for news items

Usage: news-api [command] [options]

Commands:
  serve     Start the HTTP server (default)
  init      Create the database schema and exit
  help      Show this help message

Options:
  -p, --port <port>   Server port (default: ${DEFAULT_PORT})
  --host <host>       Bind address (default: 0.0.0.0)
  --db <path>         SQLite database file (default: ${DEFAULT_DB_PATH})
  --quiet             Disable per-request logging
  -h, --help          Show help

Environment:
  NEWS_API_KEY            Shared secret for POST, PUT and DELETE (required)
  NEWS_API_KEY_HEADER     Header carrying the secret (default: X-API-Key)
  NEWS_API_PORT, NEWS_API_HOST, NEWS_API_DB
  NEWS_API_CORS_ORIGINS   Comma-separated allowed origins
  NEWS_API_LOG_REQUESTS   Set to "false" to disable per-request logging
`);
}

// ============================================
// Commands
// ============================================

function runInit(config: AppConfig): void {
  const database = openDatabase({ path: config.dbPath });
  console.log(`Database ready at ${database.getPath()}`);
  database.close();
}

async function runServe(config: AppConfig): Promise<void> {
  console.log('Starting News Items API...');
  console.log(`Database: ${config.dbPath}`);

  const database = openDatabase({ path: config.dbPath });
  const server = new ApiServer(database, config);
  await server.start();

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\nReceived ${signal}, shutting down...`);

    server.stop()
      .then(() => {
        database.close();
        process.exit(0);
      })
      .catch((err: unknown) => {
        console.error('Shutdown failed:', err);
        database.close();
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  switch (config.command) {
    case 'help':
      printHelp();
      break;
    case 'init':
      runInit(config);
      break;
    case 'serve':
      await runServe(config);
      break;
  }
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
