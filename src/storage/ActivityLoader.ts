/**
 * Insert-missing-only loading of record batches into PostgreSQL.
 *
 * Flow per call: describe table → schema check (may coerce float → integer)
 * → create table if absent → anti-join on the composite key → chunked insert
 * inside one transaction. Rows whose key is already stored are skipped, never
 * updated.
 */

import { LoaderConfig } from '../config';
import { errorMessage } from '../errors';
import { toActivityBatch } from '../mappers';
import { debugDedup, debugSchema } from '../utils/debugLogger';
import { collectKeyTuples, filterNewRows, hasNullKey } from '../utils/deduplication';
import { checkSchema } from './schemaCheck';

import type { LoadOptions, LoadResult, NormalizedActivity, RecordBatch, Row } from '../types';
import type { Logger } from '../utils/logger';
import type { ActivityStore, StoreSession } from './types';

export interface LoaderContext {
  log: Logger;
  store: ActivityStore;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

async function selectNewRows<T extends Row>(
  session: StoreSession,
  batch: RecordBatch<T>,
  table: string,
  compositeKey: readonly string[],
  log: Logger,
): Promise<{ newRows: T[]; skipped: number }> {
  if (compositeKey.length === 0) {
    return { newRows: batch.rows, skipped: 0 };
  }

  // Primary key columns are NOT NULL and NULL never matches in the key lookup
  const keyed = batch.rows.filter((row) => !hasNullKey(row, compositeKey));
  const nullKeyCount = batch.rows.length - keyed.length;
  if (nullKeyCount > 0) {
    log.warn('Skipping rows with a null key column', {
      compositeKey,
      count: nullKeyCount,
      table,
    });
  }

  const keys = collectKeyTuples(keyed, compositeKey);
  const existing = await session.findExistingKeys(table, compositeKey, keys);
  const { duplicateCount, newCount, newRows } = filterNewRows(keyed, compositeKey, existing);

  debugDedup(log, 'Composite key anti-join', {
    duplicateCount,
    inputCount: keyed.length,
    newCount,
  });

  return { newRows, skipped: duplicateCount + nullKeyCount };
}

/**
 * Load a batch into `options.table`, writing only rows whose composite key is
 * not already stored. Without a composite key every row is appended.
 *
 * Never throws for store errors: they come back as `store_failure`. The store
 * session is released on every path.
 */
export async function loadBatch<T extends Row>(
  batch: RecordBatch<T>,
  options: LoadOptions,
  context: LoaderContext,
): Promise<LoadResult> {
  const { log, store } = context;
  const { table } = options;
  const compositeKey = options.compositeKey ?? [];
  const chunkSize = Math.max(1, options.chunkSize ?? LoaderConfig.chunkSize);
  const timer = log.startTimer(`load ${table}`);

  let session: StoreSession | undefined;
  try {
    session = await store.connect();
    const activeSession = session;

    const description = await activeSession.describeTable(table);
    const check = checkSchema(description, batch);
    debugSchema(log, table, check);

    if (!check.compatible) {
      log.error('Schema mismatch, aborting load', undefined, {
        mismatches: check.mismatches.map((mismatch) => mismatch.reason),
        table,
      });
      timer.end('warn', 'Load aborted');
      return { mismatches: check.mismatches, reason: 'schema_mismatch', success: false };
    }

    if (check.coercedColumns.length > 0) {
      log.info('Coerced float columns to integer', { columns: check.coercedColumns, table });
    }

    if (!check.tableExists) {
      log.info('Table does not exist, creating it from batch schema', { table });
      await activeSession.createTable(table, batch.schema, compositeKey);
    }

    const { newRows, skipped } = await selectNewRows(activeSession, batch, table, compositeKey, log);

    if (newRows.length === 0) {
      timer.end('info', 'No new records to insert', { skipped, table });
      return { skipped, success: true, written: 0 };
    }

    const columns = Object.keys(batch.schema);
    const maxRowsPerStatement = Math.floor(
      LoaderConfig.maxBindParameters / Math.max(1, columns.length),
    );
    const rowsPerInsert = Math.max(1, Math.min(chunkSize, maxRowsPerStatement));
    const written = await activeSession.transaction(async () => {
      let count = 0;
      for (const rows of chunk(newRows, rowsPerInsert)) {
        count += await activeSession.insertRows(table, columns, rows);
      }
      return count;
    });

    timer.end('info', 'Loaded rows', { skipped, table, written });
    return { skipped, success: true, written };
  } catch (error) {
    log.error('Load failed', error, { table });
    timer.end('error', 'Load failed');
    return { error: errorMessage(error), reason: 'store_failure', success: false };
  } finally {
    session?.release();
  }
}

/**
 * Load normalized activities into the activities table keyed on
 * (athlete_id, activity_id) unless told otherwise.
 */
export async function loadActivities(
  activities: NormalizedActivity[],
  context: LoaderContext,
  options: Partial<LoadOptions> = {},
): Promise<LoadResult> {
  return loadBatch(
    toActivityBatch(activities),
    {
      chunkSize: options.chunkSize ?? LoaderConfig.chunkSize,
      compositeKey: options.compositeKey ?? LoaderConfig.compositeKey,
      table: options.table ?? LoaderConfig.table,
    },
    context,
  );
}
