/**
 * In-process stand-in for PostgresStore used by the loader, pipeline and
 * route tests.
 */

import { StoreError, UniqueViolationError } from '../errors';
import { COLUMN_DDL_TYPES } from '../storage/schemaCheck';
import { createCompositeKey, extractKeyTuple } from '../utils/deduplication';

import type { ActivityStore, StoreSession } from '../storage/types';
import type {
  BatchSchema,
  KeyTuple,
  NormalizedActivity,
  Row,
  TableDescription,
} from '../types';

// SQLSTATE PostgreSQL reports for a NULL written to a primary key column
const NOT_NULL_VIOLATION = '23502';

interface MemoryTable {
  columns: { name: string; type: string }[];
  primaryKey: string[];
  rows: Row[];
}

export interface MemoryStoreOptions {
  /** Thrown from the next insertRows call. */
  failInsertWith?: Error;
  /** Thrown from every describeTable call. */
  failDescribeWith?: Error;
}

export class MemoryStore implements ActivityStore {
  readonly tables = new Map<string, MemoryTable>();
  connections = 0;
  insertCalls = 0;
  releases = 0;
  closed = false;
  options: MemoryStoreOptions;

  constructor(options: MemoryStoreOptions = {}) {
    this.options = options;
  }

  /** Pre-create a table with explicit column types, e.g. to force a mismatch. */
  defineTable(name: string, columns: Record<string, string>, primaryKey: string[] = []): void {
    this.tables.set(name, {
      columns: Object.entries(columns).map(([column, type]) => ({ name: column, type })),
      primaryKey,
      rows: [],
    });
  }

  rows(table: string): Row[] {
    return this.tables.get(table)?.rows ?? [];
  }

  async connect(): Promise<StoreSession> {
    this.connections++;
    return new MemorySession(this);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class MemorySession implements StoreSession {
  constructor(private readonly store: MemoryStore) {}

  private table(name: string): MemoryTable {
    const table = this.store.tables.get(name);
    if (!table) {
      throw new StoreError(`relation "${name}" does not exist`, '42P01');
    }
    return table;
  }

  async createTable(table: string, schema: BatchSchema, primaryKey: readonly string[] = []) {
    if (this.store.tables.has(table)) return;
    const columns: Record<string, string> = {};
    for (const [column, type] of Object.entries(schema)) {
      columns[column] = COLUMN_DDL_TYPES[type].toLowerCase();
    }
    this.store.defineTable(table, columns, [...primaryKey]);
  }

  async deleteByActivityId(table: string, activityId: number): Promise<number> {
    const target = this.table(table);
    const before = target.rows.length;
    target.rows = target.rows.filter((row) => row.activity_id !== activityId);
    return before - target.rows.length;
  }

  async describeTable(table: string): Promise<TableDescription | null> {
    if (this.store.options.failDescribeWith) throw this.store.options.failDescribeWith;
    const target = this.store.tables.get(table);
    if (!target) return null;
    return { columns: target.columns.map((column) => ({ ...column })), name: table };
  }

  async findActivity(table: string, activityId: number): Promise<boolean> {
    return this.table(table).rows.some((row) => row.activity_id === activityId);
  }

  async findExistingKeys(
    table: string,
    keyColumns: readonly string[],
    keys: readonly KeyTuple[],
  ): Promise<KeyTuple[]> {
    const stored = new Set(
      this.table(table).rows.map((row) => createCompositeKey(extractKeyTuple(row, keyColumns))),
    );
    // NULL never compares equal in a row-value IN list
    return keys.filter(
      (key) => !key.some((cell) => cell === null) && stored.has(createCompositeKey(key)),
    );
  }

  async insertRows(table: string, columns: readonly string[], rows: readonly Row[]) {
    this.store.insertCalls++;
    const failure = this.store.options.failInsertWith;
    if (failure) {
      this.store.options.failInsertWith = undefined;
      throw failure;
    }

    const target = this.table(table);
    const stored = new Set(
      target.rows.map((row) => createCompositeKey(extractKeyTuple(row, target.primaryKey))),
    );
    for (const row of rows) {
      const copy: Row = {};
      for (const column of columns) copy[column] = row[column] ?? null;

      const nullColumn = target.primaryKey.find((column) => copy[column] === null);
      if (nullColumn !== undefined) {
        throw new StoreError(
          `null value in column "${nullColumn}" violates not-null constraint`,
          NOT_NULL_VIOLATION,
        );
      }

      if (target.primaryKey.length > 0) {
        const key = createCompositeKey(extractKeyTuple(copy, target.primaryKey));
        if (stored.has(key)) {
          throw new UniqueViolationError(`duplicate key value violates unique constraint on ${table}`);
        }
        stored.add(key);
      }
      target.rows.push(copy);
    }
    return rows.length;
  }

  release(): void {
    this.store.releases++;
  }

  async transaction<T>(work: () => Promise<T>): Promise<T> {
    const snapshot = new Map(
      [...this.store.tables].map(([name, table]) => [name, [...table.rows]]),
    );
    try {
      return await work();
    } catch (error) {
      for (const [name, rows] of snapshot) {
        const table = this.store.tables.get(name);
        if (table) table.rows = rows;
      }
      throw error;
    }
  }

  async updateByActivityId(table: string, activity: NormalizedActivity): Promise<number> {
    let count = 0;
    for (const row of this.table(table).rows) {
      if (row.activity_id !== activity.activity_id) continue;
      Object.assign(row, activity);
      count++;
    }
    return count;
  }
}
