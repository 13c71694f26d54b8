/**
 * Configuration Module
 *
 * Centralizes all application configuration from environment variables.
 * Loads .env file automatically via dotenv/config import.
 */

import 'dotenv/config';
import { REQUEST } from './constants.js';

/**
 * Reads a numeric environment variable, falling back when unset or not a number
 *
 * @param name - Environment variable name
 * @param fallback - Value used when the variable is missing or invalid
 */
function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

/**
 * Application configuration object
 *
 * All configuration values are read from environment variables with sensible defaults.
 */
export const cfg = {
  // NHL web API configuration
  nhlApi: {
    baseUrl: process.env.NHL_API_BASE_URL || 'https://api-web.nhle.com',
    timeoutMs: numberFromEnv('NHL_API_TIMEOUT_MS', REQUEST.TIMEOUT_MS) // Fixed per-request timeout
  },
  // Fetch run configuration
  fetch: {
    date: process.env.FETCH_DATE || '', // Optional: specific date to fetch (YYYY-MM-DD), empty = today
    timeZone: process.env.FETCH_TIMEZONE || 'America/New_York', // Timezone used to resolve "today"
    retries: numberFromEnv('FETCH_RETRIES', 0), // Extra attempts after a transient client failure
    retryDelayMs: numberFromEnv('FETCH_RETRY_DELAY_MS', 2000)
  },
  // Database configuration
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: numberFromEnv('DB_PORT', 5432),
    user: process.env.DB_USER || 'nhl',
    password: process.env.DB_PASSWORD || 'nhl',
    database: process.env.DB_NAME || 'nhl',
    ssl: process.env.DB_SSL === 'true' ? { rejectUnauthorized: false } : false,
    max: numberFromEnv('DB_POOL_SIZE', 5), // Connection pool size
    idleTimeoutMillis: numberFromEnv('DB_IDLE_TIMEOUT_MS', 30000),
    connectionTimeoutMillis: numberFromEnv('DB_CONNECTION_TIMEOUT_MS', 5000)
  },
  // Logging configuration
  logLevel: process.env.LOG_LEVEL || 'info' // Log level (trace, debug, info, warn, error, fatal, silent)
};
