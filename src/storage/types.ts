import type {
  BatchSchema,
  KeyTuple,
  NormalizedActivity,
  Row,
  TableDescription,
} from '../types';

/**
 * One checked-out database connection.
 * Callers must call `release()` on every exit path.
 */
export interface StoreSession {
  /** Create `table` with columns typed from `schema` and an optional primary key. */
  createTable(table: string, schema: BatchSchema, primaryKey?: readonly string[]): Promise<void>;

  deleteByActivityId(table: string, activityId: number): Promise<number>;

  /** Column names and types, or null when the table does not exist. */
  describeTable(table: string): Promise<TableDescription | null>;

  findActivity(table: string, activityId: number): Promise<boolean>;

  /** Subset of `keys` already present in `table`, compared on every key column. */
  findExistingKeys(
    table: string,
    keyColumns: readonly string[],
    keys: readonly KeyTuple[],
  ): Promise<KeyTuple[]>;

  /** Insert rows with a single statement; returns the number of rows written. */
  insertRows(table: string, columns: readonly string[], rows: readonly Row[]): Promise<number>;

  release(): void;

  /** Run `work` inside BEGIN / COMMIT, rolling back if it throws. */
  transaction<T>(work: () => Promise<T>): Promise<T>;

  /** Overwrite every non-key column of the row with this activity id. */
  updateByActivityId(table: string, activity: NormalizedActivity): Promise<number>;
}

export interface ActivityStore {
  close(): Promise<void>;
  connect(): Promise<StoreSession>;
}
