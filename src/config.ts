/**
 * Centralized configuration for the activity sync server and batch sync.
 *
 * This file extracts all configurable values from the codebase into a single location.
 * Values can be overridden via environment variables where noted.
 *
 * Configuration categories:
 * - Server: HTTP server settings (port, host, body limits)
 * - Request: Per-request limits
 * - Webhook: Strava webhook subscription verification
 * - Strava: API endpoints, credentials and paging
 * - Database: PostgreSQL connection and pool
 * - Loader: Target table, composite key and insert chunking
 * - Retry: Retry logic for Strava API calls
 */

import { ConfigError } from './errors';

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Safely parse an integer from an environment variable.
 * Throws a descriptive error if the value is not a valid number.
 *
 * @param value - The raw environment variable value (or undefined)
 * @param defaultValue - Default value if env var is not set
 * @param variableName - Name of the environment variable (for error messages)
 * @throws TypeError if value is set but not a valid integer
 */
function parseIntSafe(
  value: string | undefined,
  defaultValue: number,
  variableName: string,
): number {
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new TypeError(`Invalid ${variableName}: "${value}" is not a valid integer`);
  }
  return parsed;
}

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return !['0', 'false', 'no', 'off'].includes(value.toLowerCase());
}

/**
 * Collect the names of unset environment variables.
 */
function missingVariables(names: readonly string[]): string[] {
  return names.filter((name) => !process.env[name]);
}

// =============================================================================
// SERVER CONFIGURATION
// =============================================================================

export const ServerConfig = {
  /**
   * Server port.
   * @env PORT
   * @default 8000
   */
  port: parseIntSafe(process.env.PORT, 8000, 'PORT'),

  /**
   * Server bind address.
   * @default '0.0.0.0'
   */
  host: '0.0.0.0',

  /**
   * Maximum request body size for JSON payloads.
   * Webhook events are a few hundred bytes.
   * @default '1mb'
   */
  bodyLimit: '1mb',

  /**
   * Graceful shutdown timeout in milliseconds.
   * @default 10000 (10 seconds)
   */
  shutdownTimeoutMs: 10_000,
} as const;

// =============================================================================
// REQUEST CONFIGURATION
// =============================================================================

export const RequestConfig = {
  /**
   * Socket timeout for webhook requests in milliseconds.
   * Strava expects a response within two seconds and retries otherwise.
   * @default 30000
   */
  timeoutMs: 30_000,
} as const;

// =============================================================================
// WEBHOOK CONFIGURATION
// =============================================================================

export const WebhookConfig = {
  /**
   * Environment variable holding the token Strava echoes back during
   * subscription verification (`hub.verify_token`).
   * @env STRAVA_VERIFY_TOKEN
   */
  verifyTokenEnvVar: 'STRAVA_VERIFY_TOKEN',

  /**
   * Webhook object type that triggers processing.
   */
  activityObjectType: 'activity',
} as const;

// =============================================================================
// STRAVA CONFIGURATION
// =============================================================================

export const StravaConfig = {
  /**
   * REST API base URL.
   */
  apiBaseUrl: 'https://www.strava.com/api/v3',

  /**
   * OAuth token endpoint used for the refresh-token grant.
   */
  tokenUrl: 'https://www.strava.com/oauth/token',

  /**
   * Environment variable names for API credentials.
   * @env STRAVA_CLIENT_ID, STRAVA_CLIENT_SECRET, STRAVA_REFRESH_TOKEN
   */
  credentialEnvVars: ['STRAVA_CLIENT_ID', 'STRAVA_CLIENT_SECRET', 'STRAVA_REFRESH_TOKEN'] as const,

  /**
   * Activities requested per page (the API caps this at 200).
   * @env STRAVA_PER_PAGE
   * @default 200
   */
  perPage: parseIntSafe(process.env.STRAVA_PER_PAGE, 200, 'STRAVA_PER_PAGE'),

  /**
   * Maximum number of pages fetched by one batch run.
   * @env STRAVA_MAX_PAGES
   * @default 50
   */
  maxPages: parseIntSafe(process.env.STRAVA_MAX_PAGES, 50, 'STRAVA_MAX_PAGES'),

  /**
   * HTTP timeout for API calls in milliseconds.
   * @default 15000
   */
  timeoutMs: 15_000,

  /**
   * Seconds before `expires_at` at which a cached access token is refreshed.
   * @default 60
   */
  tokenExpirySkewSeconds: 60,
} as const;

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

export const DatabaseConfig = {
  /**
   * Full connection string. When unset, pg falls back to the standard
   * PGHOST / PGPORT / PGUSER / PGPASSWORD / PGDATABASE variables.
   * @env DATABASE_URL
   */
  connectionString: process.env.DATABASE_URL,

  /**
   * Variables required when DATABASE_URL is not set.
   */
  fallbackEnvVars: ['PGHOST', 'PGUSER', 'PGPASSWORD', 'PGDATABASE'] as const,

  /**
   * Use TLS for database connections (hosted Postgres requires it).
   * @env DATABASE_SSL
   * @default true
   */
  ssl: parseBoolean(process.env.DATABASE_SSL, true),

  /**
   * Maximum pooled connections.
   * @env DATABASE_POOL_SIZE
   * @default 5
   */
  poolSize: parseIntSafe(process.env.DATABASE_POOL_SIZE, 5, 'DATABASE_POOL_SIZE'),

  /**
   * Time to wait for a free pooled connection in milliseconds.
   * @default 30000
   */
  connectionTimeoutMs: 30_000,
} as const;

// =============================================================================
// LOADER CONFIGURATION
// =============================================================================

export const LoaderConfig = {
  /**
   * Target table for normalized activities.
   * @env ACTIVITIES_TABLE
   * @default 'activities'
   */
  table: process.env.ACTIVITIES_TABLE ?? 'activities',

  /**
   * Composite primary key of the activities table.
   */
  compositeKey: ['athlete_id', 'activity_id'] as string[],

  /**
   * Rows per INSERT statement.
   * @env LOAD_CHUNK_SIZE
   * @default 1000
   */
  chunkSize: parseIntSafe(process.env.LOAD_CHUNK_SIZE, 1000, 'LOAD_CHUNK_SIZE'),

  /**
   * PostgreSQL accepts at most 65535 bind parameters per statement.
   * Insert chunks and key lookups are capped to stay under it.
   */
  maxBindParameters: 65_535,
} as const;

// =============================================================================
// RETRY CONFIGURATION
// =============================================================================

export const RetryConfig = {
  /**
   * Maximum attempts for Strava API calls.
   * @default 3
   */
  maxRetries: 3,

  /**
   * Base delay for exponential backoff in milliseconds.
   * Actual delay = baseDelayMs * 2^attemptNumber.
   * @default 1000
   */
  baseDelayMs: 1000,
} as const;

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HttpStatus = {
  BAD_REQUEST: 400,
  FORBIDDEN: 403,
  INTERNAL_SERVER_ERROR: 500,
  OK: 200,
} as const;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Fail fast when the Strava credentials are missing.
 */
export function validateStravaEnv(): void {
  const missing = missingVariables(StravaConfig.credentialEnvVars);
  if (missing.length > 0) {
    throw new ConfigError(`Missing environment variables: ${missing.join(', ')}`);
  }
}

/**
 * Fail fast when neither DATABASE_URL nor the PG* variables are set.
 */
export function validateDatabaseEnv(): void {
  if (DatabaseConfig.connectionString) return;
  const missing = missingVariables(DatabaseConfig.fallbackEnvVars);
  if (missing.length > 0) {
    throw new ConfigError(
      `DATABASE_URL is not set and fallback variables are missing: ${missing.join(', ')}`,
    );
  }
}

/**
 * Fail fast when the webhook verification token is missing.
 */
export function validateWebhookEnv(): void {
  if (!process.env[WebhookConfig.verifyTokenEnvVar]) {
    throw new ConfigError(`${WebhookConfig.verifyTokenEnvVar} environment variable is required`);
  }
}
