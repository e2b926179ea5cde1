/**
 * Cleanroom Configuration
 *
 * Environment driven with development defaults.
 * DATABASE_URL selects the Postgres record store; without it the CSV
 * directory is read instead.
 */

import * as path from 'path';

export interface CleanroomConfig {
  /** Postgres connection string, null when the CSV store is used */
  databaseUrl: string | null;
  /** Directory holding users.csv, transactions.csv and app_events.csv */
  csvDir: string;
  /** HTTP port for the report server */
  port: number;
  /** Max connections in the pg pool */
  dbPoolMax: number;
  dbSsl: boolean;
  /** Queries slower than this are logged */
  slowQueryMs: number;
}

type Env = Record<string, string | undefined>;

/**
 * Load configuration from environment
 */
export function loadConfig(env: Env = process.env): CleanroomConfig {
  return {
    databaseUrl: env.DATABASE_URL || null,
    csvDir: path.resolve(env.CSV_DIR || path.join(process.cwd(), 'data')),
    port: parseInteger(env.PORT, 3030),
    dbPoolMax: parseInteger(env.DB_POOL_MAX, 10),
    dbSsl: env.DB_SSL === 'true',
    slowQueryMs: parseInteger(env.DB_SLOW_QUERY_MS, 1000),
  };
}

/**
 * Validate configuration
 * Returns errors if configuration is invalid
 */
export function validateConfig(config: CleanroomConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push('PORT must be an integer between 0 and 65535');
  }

  if (!Number.isInteger(config.dbPoolMax) || config.dbPoolMax < 1) {
    errors.push('DB_POOL_MAX must be a positive integer');
  }

  if (!Number.isInteger(config.slowQueryMs) || config.slowQueryMs < 0) {
    errors.push('DB_SLOW_QUERY_MS must be a non-negative integer');
  }

  if (config.databaseUrl && !/^postgres(ql)?:\/\//.test(config.databaseUrl)) {
    errors.push('DATABASE_URL must be a postgres:// or postgresql:// URL');
  }

  return errors;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return Number(value);
}

// Singleton config instance
let configInstance: CleanroomConfig | null = null;

/**
 * Get configuration (singleton)
 */
export function getConfig(): CleanroomConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
