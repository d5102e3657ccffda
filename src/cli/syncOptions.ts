import { InvalidArgumentError } from 'commander';

import type { BatchSyncOptions } from '../pipelines/batchSync';

/** Raw option values as commander hands them over. */
export interface SyncCliOptions {
  after?: Date;
  csv?: string;
  dedupe: boolean;
  maxPages?: number;
  perPage?: number;
  table?: string;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Accepts a calendar date (2024-01-31) or a full ISO-8601 timestamp.
 */
export function parseAfterDate(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError('Expected a date such as 2024-01-31.');
  }
  return date;
}

export function toBatchSyncOptions(options: SyncCliOptions): BatchSyncOptions {
  return {
    after: options.after,
    // --no-dedupe skips the existing-row check
    compositeKey: options.dedupe ? undefined : [],
    csvPath: options.csv,
    maxPages: options.maxPages,
    perPage: options.perPage,
    table: options.table,
  };
}
