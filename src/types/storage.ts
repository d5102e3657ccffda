/**
 * Storage type definitions.
 * Row, batch and schema types shared by the schema checker, the loader and the stores.
 */

export type CellValue = boolean | Date | number | string | null;

export type Row = Record<string, CellValue>;

/** Semantic column type of a batch, independent of the target database. */
export type SemanticType = 'boolean' | 'date' | 'float' | 'integer' | 'string' | 'timestamp';

export type BatchSchema = Record<string, SemanticType>;

/**
 * Rows plus their column types.
 * The schema checker may rewrite both when it coerces a float column to integer.
 */
export interface RecordBatch<T extends Row = Row> {
  rows: T[];
  schema: BatchSchema;
}

export interface ColumnDescription {
  name: string;
  type: string; // as reported by information_schema, e.g. "double precision"
}

export interface TableDescription {
  columns: ColumnDescription[];
  name: string;
}

export interface SchemaMismatch {
  column: string;
  expected: string;
  observed: SemanticType;
  reason: string;
}

export interface SchemaCheckResult {
  coercedColumns: string[];
  compatible: boolean;
  mismatches: SchemaMismatch[];
  tableExists: boolean;
}

export type KeyTuple = CellValue[];

export interface LoadOptions {
  table: string;
  chunkSize?: number;
  compositeKey?: string[];
}

export type LoadResult =
  | { reason: 'schema_mismatch'; success: false; mismatches: SchemaMismatch[] }
  | { reason: 'store_failure'; success: false; error: string }
  | { skipped: number; success: true; written: number };
