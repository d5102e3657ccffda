import pg from 'pg';

import { DatabaseConfig, LoaderConfig } from '../config';
import { StoreError, UNIQUE_VIOLATION, UniqueViolationError } from '../errors';
import { debugStorage } from '../utils/debugLogger';
import { logger as defaultLogger } from '../utils/logger';
import { COLUMN_DDL_TYPES } from './schemaCheck';

import type {
  BatchSchema,
  CellValue,
  KeyTuple,
  NormalizedActivity,
  Row,
  TableDescription,
} from '../types';
import type { Logger } from '../utils/logger';
import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import type { ActivityStore, StoreSession } from './types';

/**
 * Quote a possibly schema-qualified identifier ("public.activities").
 */
export function quoteIdentifier(name: string): string {
  return name
    .split('.')
    .map((part) => `"${part.replaceAll('"', '""')}"`)
    .join('.');
}

function splitTableName(table: string): { schema?: string; name: string } {
  const dot = table.indexOf('.');
  return dot === -1 ? { name: table } : { name: table.slice(dot + 1), schema: table.slice(0, dot) };
}

/**
 * Build "($1, $2), ($3, $4)" for `rowCount` tuples of `width` parameters.
 */
export function placeholderTuples(rowCount: number, width: number, offset = 0): string {
  const tuples: string[] = [];
  for (let row = 0; row < rowCount; row++) {
    const params: string[] = [];
    for (let column = 0; column < width; column++) {
      params.push(`$${String(offset + row * width + column + 1)}`);
    }
    tuples.push(`(${params.join(', ')})`);
  }
  return tuples.join(', ');
}

function toCellValue(value: unknown): CellValue {
  if (
    value === null ||
    typeof value === 'boolean' ||
    typeof value === 'number' ||
    typeof value === 'string' ||
    value instanceof Date
  ) {
    return value;
  }
  if (value === undefined) return null;
  return String(value);
}

/**
 * Convert a pg error into a StoreError, keeping the SQLSTATE code.
 */
export function toStoreError(error: unknown, operation: string): StoreError {
  if (error instanceof StoreError) return error;

  const code =
    error instanceof Error && 'code' in error && typeof error.code === 'string'
      ? error.code
      : undefined;
  const message = `${operation} failed: ${error instanceof Error ? error.message : String(error)}`;

  if (code === UNIQUE_VIOLATION) {
    return new UniqueViolationError(message, { cause: error });
  }
  return new StoreError(message, code, { cause: error });
}

class PostgresSession implements StoreSession {
  private released = false;

  constructor(
    private readonly client: PoolClient,
    private readonly log: Logger,
  ) {}

  async createTable(
    table: string,
    schema: BatchSchema,
    primaryKey: readonly string[] = [],
  ): Promise<void> {
    const columns = Object.entries(schema).map(
      ([column, type]) => `${quoteIdentifier(column)} ${COLUMN_DDL_TYPES[type]}`,
    );
    if (primaryKey.length > 0) {
      columns.push(`PRIMARY KEY (${primaryKey.map((column) => quoteIdentifier(column)).join(', ')})`);
    }
    const sql = `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(table)} (${columns.join(', ')})`;

    await this.query('createTable', sql);
    this.log.info('Created table', { columns: Object.keys(schema).length, primaryKey, table });
  }

  async deleteByActivityId(table: string, activityId: number): Promise<number> {
    const result = await this.query(
      'deleteByActivityId',
      `DELETE FROM ${quoteIdentifier(table)} WHERE "activity_id" = $1`,
      [activityId],
    );
    return result.rowCount ?? 0;
  }

  async describeTable(table: string): Promise<TableDescription | null> {
    const { name, schema } = splitTableName(table);
    const result = await this.query<{ column_name: string; data_type: string }>(
      'describeTable',
      `SELECT column_name, data_type
         FROM information_schema.columns
        WHERE table_schema = COALESCE($2::text, current_schema()) AND table_name = $1
        ORDER BY ordinal_position`,
      [name, schema ?? null],
    );

    if (result.rows.length === 0) return null;

    return {
      columns: result.rows.map((row) => ({ name: row.column_name, type: row.data_type })),
      name: table,
    };
  }

  async findActivity(table: string, activityId: number): Promise<boolean> {
    const result = await this.query(
      'findActivity',
      `SELECT 1 FROM ${quoteIdentifier(table)} WHERE "activity_id" = $1 LIMIT 1`,
      [activityId],
    );
    return result.rows.length > 0;
  }

  async findExistingKeys(
    table: string,
    keyColumns: readonly string[],
    keys: readonly KeyTuple[],
  ): Promise<KeyTuple[]> {
    if (keys.length === 0 || keyColumns.length === 0) return [];

    const columnList = keyColumns.map((column) => quoteIdentifier(column)).join(', ');
    const tuplesPerQuery = Math.floor(LoaderConfig.maxBindParameters / keyColumns.length);
    const found: KeyTuple[] = [];

    for (let start = 0; start < keys.length; start += tuplesPerQuery) {
      const chunk = keys.slice(start, start + tuplesPerQuery);
      const sql =
        `SELECT ${columnList} FROM ${quoteIdentifier(table)} ` +
        `WHERE (${columnList}) IN (${placeholderTuples(chunk.length, keyColumns.length)})`;

      const result = await this.query('findExistingKeys', sql, chunk.flat());
      for (const row of result.rows) {
        found.push(keyColumns.map((column) => toCellValue(row[column])));
      }
    }

    return found;
  }

  async insertRows(table: string, columns: readonly string[], rows: readonly Row[]): Promise<number> {
    if (rows.length === 0) return 0;

    const sql =
      `INSERT INTO ${quoteIdentifier(table)} ` +
      `(${columns.map((column) => quoteIdentifier(column)).join(', ')}) ` +
      `VALUES ${placeholderTuples(rows.length, columns.length)}`;
    const values = rows.flatMap((row) => columns.map((column) => row[column] ?? null));

    const result = await this.query('insertRows', sql, values);
    return result.rowCount ?? 0;
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.client.release();
  }

  async transaction<T>(work: () => Promise<T>): Promise<T> {
    await this.query('begin', 'BEGIN');
    try {
      const result = await work();
      await this.query('commit', 'COMMIT');
      return result;
    } catch (error) {
      try {
        await this.client.query('ROLLBACK');
      } catch (rollbackError) {
        this.log.error('Rollback failed', rollbackError);
      }
      throw error;
    }
  }

  async updateByActivityId(table: string, activity: NormalizedActivity): Promise<number> {
    const entries = Object.entries(activity).filter(([column]) => column !== 'activity_id');
    const assignments = entries.map(
      ([column], index) => `${quoteIdentifier(column)} = $${String(index + 1)}`,
    );
    const values: CellValue[] = entries.map(([, value]) => value);
    values.push(activity.activity_id);

    const result = await this.query(
      'updateByActivityId',
      `UPDATE ${quoteIdentifier(table)} SET ${assignments.join(', ')} ` +
        `WHERE "activity_id" = $${String(values.length)}`,
      values,
    );
    return result.rowCount ?? 0;
  }

  private async query<R extends QueryResultRow = Record<string, unknown>>(
    operation: string,
    sql: string,
    values: unknown[] = [],
  ): Promise<QueryResult<R>> {
    debugStorage(this.log, operation, { parameterCount: values.length, sql });
    try {
      return await this.client.query<R>(sql, values);
    } catch (error) {
      throw toStoreError(error, operation);
    }
  }
}

/**
 * Activity store backed by a pg connection pool.
 */
export class PostgresStore implements ActivityStore {
  private readonly log: Logger;
  private readonly pool: Pool;

  constructor(pool: Pool, log: Logger = defaultLogger) {
    this.pool = pool;
    this.log = log;
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.log.info('Database pool closed');
  }

  async connect(): Promise<StoreSession> {
    try {
      const client = await this.pool.connect();
      return new PostgresSession(client, this.log);
    } catch (error) {
      throw toStoreError(error, 'connect');
    }
  }
}

/**
 * Create a pool from DatabaseConfig (DATABASE_URL or the PG* variables).
 */
export function createPool(): Pool {
  return new pg.Pool({
    connectionString: DatabaseConfig.connectionString,
    connectionTimeoutMillis: DatabaseConfig.connectionTimeoutMs,
    max: DatabaseConfig.poolSize,
    ssl: DatabaseConfig.ssl ? { rejectUnauthorized: false } : undefined,
  });
}
