/**
 * Application configuration
 * Built once at startup from defaults, environment, and CLI flags, then frozen
 */

import { z } from 'zod';
import { resolve } from 'path';

// ============================================
// Types
// ============================================

export type Command = 'serve' | 'init' | 'help';

export interface AppConfig {
  readonly command: Command;
  readonly port: number;
  readonly host: string;
  readonly dbPath: string;
  readonly apiKey: string;
  readonly apiKeyHeader: string;
  readonly corsOrigins: readonly string[];
  readonly logRequests: boolean;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map(p => `  - ${p}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_DB_PATH = './data/news.db';
export const DEFAULT_API_KEY_HEADER = 'X-API-Key';

// ============================================
// Schema
// ============================================

const configSchema = z.object({
  command: z.enum(['serve', 'init', 'help']),
  port: z.preprocess(
    value => (typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value),
    z.number({ invalid_type_error: 'port must be a number' }).int().min(0).max(65535),
  ),
  host: z.string().min(1),
  dbPath: z.string().min(1),
  apiKey: z.string(),
  apiKeyHeader: z.string().regex(/^[A-Za-z0-9-]+$/, 'header name may only contain letters, digits and dashes'),
  corsOrigins: z.array(z.string().min(1)),
  logRequests: z.boolean(),
});

const MISSING_API_KEY = 'apiKey: NEWS_API_KEY must be set to a non-empty secret';

// ============================================
// Loading
// ============================================

type Env = Record<string, string | undefined>;

interface RawConfig {
  command: string;
  port: string | number;
  host: string;
  dbPath: string;
  apiKey: string;
  apiKeyHeader: string;
  corsOrigins: string[];
  logRequests: boolean;
}

function fromEnv(env: Env): RawConfig {
  return {
    command: 'serve',
    port: env.NEWS_API_PORT ?? DEFAULT_PORT,
    host: env.NEWS_API_HOST ?? DEFAULT_HOST,
    dbPath: env.NEWS_API_DB ?? DEFAULT_DB_PATH,
    apiKey: env.NEWS_API_KEY ?? '',
    apiKeyHeader: env.NEWS_API_KEY_HEADER ?? DEFAULT_API_KEY_HEADER,
    corsOrigins: (env.NEWS_API_CORS_ORIGINS ?? '')
      .split(',')
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0),
    logRequests: env.NEWS_API_LOG_REQUESTS !== 'false',
  };
}

function applyArgs(raw: RawConfig, args: string[]): RawConfig {
  const result = { ...raw };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === 'serve' || arg === 'init' || arg === 'help') {
      result.command = arg;
    } else if (arg === '--port' || arg === '-p') {
      result.port = args[++i] ?? '';
    } else if (arg === '--host') {
      result.host = args[++i] ?? '';
    } else if (arg === '--db') {
      result.dbPath = args[++i] ?? '';
    } else if (arg === '--quiet') {
      result.logRequests = false;
    } else if (arg === '--help' || arg === '-h') {
      result.command = 'help';
    } else {
      result.command = arg;
    }
  }

  return result;
}

/**
 * Build the frozen configuration. Flags override environment values.
 */
export function loadConfig(args: string[] = process.argv.slice(2), env: Env = process.env): AppConfig {
  const raw = applyArgs(fromEnv(env), args);
  const parsed = configSchema.safeParse(raw);

  const problems: string[] = parsed.success ? [] : parsed.error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
  // Printing usage needs no secret
  if (raw.command !== 'help' && raw.apiKey.length === 0) {
    problems.push(MISSING_API_KEY);
  }

  if (!parsed.success || problems.length > 0) {
    throw new ConfigError(problems);
  }

  const { data } = parsed;
  return Object.freeze({
    ...data,
    dbPath: data.dbPath === ':memory:' ? data.dbPath : resolve(data.dbPath),
    corsOrigins: Object.freeze([...data.corsOrigins]),
  });
}
