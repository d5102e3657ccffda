/**
 * Debug logging utilities for troubleshooting data flow.
 * Enabled via DEBUG_LOGGING=true environment variable.
 *
 * Categories:
 * - REQUEST: Raw incoming request bodies
 * - WEBHOOK: Webhook event routing decisions
 * - API: Strava API requests and paging
 * - TRANSFORM: Activity mapping and defaulted fields
 * - SCHEMA: Schema compatibility checks and coercions
 * - DEDUP: Composite-key anti-join results
 * - STORAGE: SQL statements sent to the database
 */

import type { LogContext, Logger } from './logger';

export type DebugCategory =
  | 'API'
  | 'DEDUP'
  | 'REQUEST'
  | 'SCHEMA'
  | 'STORAGE'
  | 'TRANSFORM'
  | 'WEBHOOK';

/**
 * Log a Strava API call.
 */
export function debugApi(logger: Logger, operation: string, details: LogContext): void {
  if (!isDebugEnabled()) return;

  debugLog(logger, 'API', operation, details);
}

/**
 * Log deduplication operation.
 */
export function debugDedup(
  logger: Logger,
  operation: string,
  details: {
    duplicateCount: number;
    inputCount: number;
    newCount: number;
    duplicateSamples?: unknown[];
  },
): void {
  if (!isDebugEnabled()) return;

  debugLog(logger, 'DEDUP', operation, details);
}

/**
 * Core debug logging function.
 * Only logs if DEBUG_LOGGING is enabled.
 */
export function debugLog(
  logger: Logger,
  category: DebugCategory,
  message: string,
  data?: unknown,
): void {
  if (!isDebugEnabled()) return;

  const context: LogContext = {
    debugCategory: category,
  };

  if (data !== undefined) {
    context.data = data;
  }

  logger.debug(`[DEBUG:${category}] ${message}`, context);
}

/**
 * Log raw request body.
 */
export function debugRequest(logger: Logger, body: unknown, metadata?: LogContext): void {
  if (!isDebugEnabled()) return;

  const bodySize = JSON.stringify(body ?? {}).length;
  debugLog(logger, 'REQUEST', `Raw request body (${String(bodySize)} bytes)`, {
    body,
    ...metadata,
  });
}

/**
 * Log the outcome of a schema compatibility check.
 */
export function debugSchema(
  logger: Logger,
  table: string,
  details: { coercedColumns: string[]; compatible: boolean; tableExists: boolean },
): void {
  if (!isDebugEnabled()) return;

  debugLog(logger, 'SCHEMA', `Schema check for ${table}`, details);
}

/**
 * Log storage operation.
 */
export function debugStorage(
  logger: Logger,
  operation: string,
  details: {
    sql?: string;
    parameterCount?: number;
    rowCount?: number;
    table?: string;
  },
): void {
  if (!isDebugEnabled()) return;

  debugLog(logger, 'STORAGE', operation, details);
}

/**
 * Log data transformation.
 */
export function debugTransform(
  logger: Logger | undefined,
  operation: string,
  input: unknown,
  output: unknown,
  metadata?: LogContext,
): void {
  if (!isDebugEnabled() || !logger) return;

  debugLog(logger, 'TRANSFORM', operation, {
    input,
    output,
    ...metadata,
  });
}

/**
 * Log how a webhook event was routed.
 */
export function debugWebhook(logger: Logger, decision: string, event: unknown): void {
  if (!isDebugEnabled()) return;

  debugLog(logger, 'WEBHOOK', decision, { event });
}

/**
 * Check if debug logging is enabled.
 */
export function isDebugEnabled(): boolean {
  return process.env.DEBUG_LOGGING === 'true';
}
