/**
 * Schema compatibility checks between a batch and an existing PostgreSQL table.
 */

import { roundHalfEven } from '../utils/rounding';

import type {
  BatchSchema,
  RecordBatch,
  Row,
  SchemaCheckResult,
  SchemaMismatch,
  SemanticType,
  TableDescription,
} from '../types';

const DATE_ONLY_REGEX = /^\d{4}-\d{2}-\d{2}$/;

const FLOAT_TYPES = ['REAL', 'DOUBLE PRECISION', 'FLOAT', 'NUMERIC', 'DECIMAL'];
const INTEGER_TYPES = ['INTEGER', 'BIGINT', 'SMALLINT', 'INT', 'INT2', 'INT4', 'INT8'];
const TEMPORAL_TYPES = [
  'DATE',
  'TIMESTAMP',
  'TIMESTAMP WITHOUT TIME ZONE',
  'TIMESTAMP WITH TIME ZONE',
  'TIMESTAMPTZ',
];

/**
 * PostgreSQL column types each batch type may be written to.
 */
export const COMPATIBLE_TYPES: Record<SemanticType, ReadonlySet<string>> = {
  boolean: new Set(['BOOLEAN', 'BOOL']),
  date: new Set(TEMPORAL_TYPES),
  float: new Set(FLOAT_TYPES),
  // Integers fit losslessly into floating point columns
  integer: new Set([...INTEGER_TYPES, ...FLOAT_TYPES]),
  string: new Set(['TEXT', 'VARCHAR', 'CHARACTER VARYING', 'CHARACTER', 'CHAR']),
  timestamp: new Set(TEMPORAL_TYPES),
};

/**
 * PostgreSQL type used when creating a table from a batch schema.
 */
export const COLUMN_DDL_TYPES: Record<SemanticType, string> = {
  boolean: 'BOOLEAN',
  date: 'DATE',
  float: 'DOUBLE PRECISION',
  integer: 'BIGINT',
  string: 'TEXT',
  timestamp: 'TIMESTAMP',
};

/**
 * Upper-case a reported column type and drop its parameters,
 * e.g. "character varying(255)" → "CHARACTER VARYING", "float(53)" → "FLOAT".
 */
export function normalizePgType(type: string): string {
  return type
    .replaceAll(/\(.*?\)/g, '')
    .replaceAll(/\s+/g, ' ')
    .trim()
    .toUpperCase();
}

function isIntegerType(pgType: string): boolean {
  return INTEGER_TYPES.includes(pgType);
}

function inferValueType(value: unknown): SemanticType | undefined {
  if (typeof value === 'boolean') return 'boolean';
  if (value instanceof Date) return 'timestamp';
  if (typeof value === 'string') return DATE_ONLY_REGEX.test(value) ? 'date' : 'string';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'float';
  return undefined;
}

/**
 * Infer column types from row values.
 * - a column mixing integral and fractional numbers is float
 * - a column mixing dates with other strings is string
 * - a column whose values are all null gets no entry
 * - any other mix falls back to string
 */
export function inferBatchSchema(rows: readonly Row[]): BatchSchema {
  const schema: BatchSchema = {};

  for (const row of rows) {
    for (const [column, value] of Object.entries(row)) {
      const observed = inferValueType(value);
      if (!observed) continue;

      const current = schema[column];
      if (current === undefined || current === observed) {
        schema[column] = observed;
      } else if (
        (current === 'integer' && observed === 'float') ||
        (current === 'float' && observed === 'integer')
      ) {
        schema[column] = 'float';
      } else {
        schema[column] = 'string';
      }
    }
  }

  return schema;
}

/**
 * Round every value of a float column and retype it as integer.
 */
function coerceColumnToInteger(batch: RecordBatch, column: string): void {
  for (const row of batch.rows) {
    const value = row[column];
    if (typeof value === 'number') {
      row[column] = roundHalfEven(value);
    }
  }
  batch.schema[column] = 'integer';
}

/**
 * Check that every batch column present in the table can be written to it.
 *
 * A missing table is compatible; the loader creates it from the batch schema.
 * A float batch column targeting an integer column is the one mismatch that is
 * corrected rather than reported: the batch is rounded in place first.
 */
export function checkSchema(table: TableDescription | null, batch: RecordBatch): SchemaCheckResult {
  if (!table) {
    return { coercedColumns: [], compatible: true, mismatches: [], tableExists: false };
  }

  const tableTypes = new Map(table.columns.map((column) => [column.name, column.type]));
  const mismatches: SchemaMismatch[] = [];
  const coercible: string[] = [];

  for (const [column, observed] of Object.entries(batch.schema)) {
    const reportedType = tableTypes.get(column);
    if (reportedType === undefined) continue;

    const pgType = normalizePgType(reportedType);
    if (COMPATIBLE_TYPES[observed].has(pgType)) continue;

    if (observed === 'float' && isIntegerType(pgType)) {
      coercible.push(column);
      continue;
    }

    mismatches.push({
      column,
      expected: pgType,
      observed,
      reason: `${column}: ${observed} vs ${pgType}`,
    });
  }

  if (mismatches.length > 0) {
    return { coercedColumns: [], compatible: false, mismatches, tableExists: true };
  }

  for (const column of coercible) {
    coerceColumnToInteger(batch, column);
  }

  return { coercedColumns: coercible, compatible: true, mismatches: [], tableExists: true };
}
