import type { CellValue, KeyTuple, Row } from '../types';

/**
 * Normalize one key cell so values read back from PostgreSQL compare equal to
 * batch values: BIGINT columns come back from pg as strings, DATE columns as Date.
 */
function normalizeKeyCell(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Create a deterministic key string for a tuple of key values.
 * JSON encoding keeps values containing the separator distinct.
 */
export function createCompositeKey(values: readonly (CellValue | undefined)[]): string {
  return JSON.stringify(values.map((value) => normalizeKeyCell(value)));
}

export function extractKeyTuple(row: Row, keyColumns: readonly string[]): KeyTuple {
  return keyColumns.map((column) => row[column] ?? null);
}

/**
 * True when any key column of the row is null or missing.
 */
export function hasNullKey(row: Row, keyColumns: readonly string[]): boolean {
  return keyColumns.some((column) => row[column] === null || row[column] === undefined);
}

/**
 * Build a hash set of composite keys for O(1) existence lookup.
 */
export function buildKeySet(tuples: Iterable<KeyTuple>): Set<string> {
  const keySet = new Set<string>();
  for (const tuple of tuples) {
    keySet.add(createCompositeKey(tuple));
  }
  return keySet;
}

/**
 * Distinct key tuples of a batch, in first-seen order.
 */
export function collectKeyTuples(rows: readonly Row[], keyColumns: readonly string[]): KeyTuple[] {
  const seen = new Set<string>();
  const tuples: KeyTuple[] = [];
  for (const row of rows) {
    const tuple = extractKeyTuple(row, keyColumns);
    const key = createCompositeKey(tuple);
    if (!seen.has(key)) {
      seen.add(key);
      tuples.push(tuple);
    }
  }
  return tuples;
}

/**
 * Left anti-join of `incoming` against the keys already stored.
 * A row is new iff no stored key matches it on every key column.
 *
 * Uses a separate Set for within-batch deduplication so a key repeated in
 * the same batch is only written once.
 */
export function filterNewRows<T extends Row>(
  incoming: readonly T[],
  keyColumns: readonly string[],
  existingKeys: Iterable<KeyTuple>,
): {
  duplicateCount: number;
  newCount: number;
  newRows: T[];
} {
  const existing = buildKeySet(existingKeys);
  const batchKeys = new Set<string>();
  const newRows: T[] = [];
  let duplicateCount = 0;

  for (const row of incoming) {
    const key = createCompositeKey(extractKeyTuple(row, keyColumns));
    if (existing.has(key) || batchKeys.has(key)) {
      duplicateCount++;
    } else {
      newRows.push(row);
      batchKeys.add(key);
    }
  }

  return {
    duplicateCount,
    newCount: newRows.length,
    newRows,
  };
}
