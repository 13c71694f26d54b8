/**
 * Application Constants
 *
 * Centralized location for magic numbers and fixed identifiers.
 */

/**
 * Remote API request settings
 */
export const REQUEST = {
  /** Hard timeout for the single scoreboard request (30 seconds) */
  TIMEOUT_MS: 30000,

  /** Identifies this service to the remote API */
  USER_AGENT: 'nhl-score-ingest/0.1',
} as const;

/**
 * Database readiness check configuration
 */
export const HEALTH_CHECK = {
  /** Maximum retries for the database readiness probe */
  MAX_RETRIES: 10,

  /** Delay between retries (2 seconds) */
  RETRY_DELAY_MS: 2000,

  /** Connection timeout for each probe (1 second) */
  CONNECTION_TIMEOUT_MS: 1000,
} as const;

/**
 * PostgreSQL SQLSTATE codes the storage layer translates
 */
export const PG_ERROR_CODES = {
  UNIQUE_VIOLATION: '23505',
  FOREIGN_KEY_VIOLATION: '23503',
} as const;
