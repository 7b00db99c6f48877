/**
 * Configuration Module
 * 
 * Centralizes all application configuration from environment variables.
 * Loads .env file automatically via dotenv/config import.
 */

import 'dotenv/config';
import { ValidationError } from '../errors/index.js';

/**
 * Splits a comma-separated environment variable into trimmed, non-empty entries
 */
function list(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value.split(',').map(v => v.trim()).filter(Boolean);
}

/**
 * Application configuration object
 * 
 * All configuration values are read from environment variables with sensible defaults.
 */
export const cfg = {
  // Upstream statistics source
  source: {
    baseUrl: process.env.SOURCE_BASE_URL || 'https://www.basketball-reference.com',
    userAgent: process.env.SOURCE_USER_AGENT || 'Mozilla/5.0 (Windows NT 10.0; Win64; x64)',
    minDelayMs: Number(process.env.SOURCE_MIN_DELAY_MS || '3000'), // Lower bound of the randomized gap between requests
    maxDelayMs: Number(process.env.SOURCE_MAX_DELAY_MS || '5000'),
    timeoutMs: Number(process.env.SOURCE_TIMEOUT_MS || '30000'),
    rateLimitCooldownMs: Number(process.env.SOURCE_RATE_LIMIT_COOLDOWN_MS || '300000'), // Pause after the source reports a rate limit
    months: list(process.env.SOURCE_MONTHS, ['october', 'november', 'december', 'january', 'february', 'march', 'april'])
  },
  // Retry policy applied to every page fetch
  retry: {
    maxRetries: Number(process.env.RETRY_MAX_ATTEMPTS || '3'), // Total attempts, including the first
    baseDelayMs: Number(process.env.RETRY_BASE_DELAY_MS || '2000')
  },
  // Scrape target
  ingest: {
    defaultSeason: process.env.SEASON || '2022-23',
    seasonType: process.env.SEASON_TYPE || 'Regular Season'
  },
  // Markov model defaults
  model: {
    lagSeconds: Number(process.env.MODEL_LAG_SECONDS || '2'),
    maxDifferential: Number(process.env.MODEL_MAX_DIFFERENTIAL || '50')
  },
  // Database configuration
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: Number(process.env.DB_PORT || '5432'),
    user: process.env.DB_USER || 'courtside',
    password: process.env.DB_PASSWORD || 'courtside',
    database: process.env.DB_NAME || 'courtside',
    ssl: process.env.DB_SSL === 'true' ? { rejectUnauthorized: false } : false,
    max: Number(process.env.DB_POOL_SIZE || '4'), // Single writer; the pool only serves sequential queries
    idleTimeoutMillis: Number(process.env.DB_IDLE_TIMEOUT_MS || '30000'),
    connectionTimeoutMillis: Number(process.env.DB_CONNECTION_TIMEOUT_MS || '5000')
  },
  // Logging configuration
  logLevel: process.env.LOG_LEVEL || 'info' // Log level (trace, debug, info, warn, error, fatal, silent)
};

export type AppConfig = typeof cfg;

function requireNumber(value: number, field: string, min: number, integer = false): void {
  if (!Number.isFinite(value) || value < min || (integer && !Number.isInteger(value))) {
    throw new ValidationError(`Invalid configuration value for ${field}: ${value}`, field);
  }
}

/**
 * Rejects numeric settings that are missing, non-numeric or out of range
 * 
 * @throws ValidationError naming the offending setting
 */
export function validateConfig(config: AppConfig): AppConfig {
  const { source, retry, model, database } = config;
  requireNumber(source.minDelayMs, 'source.minDelayMs', 0);
  requireNumber(source.maxDelayMs, 'source.maxDelayMs', source.minDelayMs);
  requireNumber(source.timeoutMs, 'source.timeoutMs', 1);
  requireNumber(source.rateLimitCooldownMs, 'source.rateLimitCooldownMs', 0);
  if (source.months.length === 0) {
    throw new ValidationError('Invalid configuration value for source.months: empty', 'source.months');
  }
  requireNumber(retry.maxRetries, 'retry.maxRetries', 1, true);
  requireNumber(retry.baseDelayMs, 'retry.baseDelayMs', 0);
  requireNumber(model.lagSeconds, 'model.lagSeconds', 0.1);
  requireNumber(model.maxDifferential, 'model.maxDifferential', 0, true);
  requireNumber(database.port, 'database.port', 1, true);
  requireNumber(database.max, 'database.max', 1, true);
  return config;
}

validateConfig(cfg);
