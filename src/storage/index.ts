import { createPool, PostgresStore } from './PostgresStore';

// Created lazily so that importing storage never opens a connection
let storeInstance: PostgresStore | undefined;

export function getStore(): PostgresStore {
  storeInstance ??= new PostgresStore(createPool());
  return storeInstance;
}

export async function closeStore(): Promise<void> {
  if (!storeInstance) return;
  const store = storeInstance;
  storeInstance = undefined;
  await store.close();
}

export { loadActivities, loadBatch } from './ActivityLoader';
export type { LoaderContext } from './ActivityLoader';
export { exportToCsv, toCsv } from './csvExport';
export { createPool, PostgresStore } from './PostgresStore';
export { checkSchema, inferBatchSchema, normalizePgType } from './schemaCheck';
export type { ActivityStore, StoreSession } from './types';
