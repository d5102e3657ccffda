/**
 * CSV export of fetched activity records.
 * Nested values are flattened so each record is exactly one line.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import { logger as defaultLogger } from '../utils/logger';

import type { Logger } from '../utils/logger';

const NEEDS_QUOTING_REGEX = /[",\r\n]/;

function stringifyNested(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Flatten one value to cell text:
 * - arrays become their comma-joined items
 * - objects become JSON
 * - null and undefined become an empty cell
 */
export function formatCsvValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map((item) => stringifyNested(item)).join(',');
  }
  return stringifyNested(value);
}

export function escapeCsvField(text: string): string {
  return NEEDS_QUOTING_REGEX.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
}

/**
 * Header is the union of record keys in first-seen order.
 */
export function collectColumns(records: readonly Record<string, unknown>[]): string[] {
  const columns = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      columns.add(key);
    }
  }
  return [...columns];
}

export function toCsv(records: readonly Record<string, unknown>[]): string {
  const columns = collectColumns(records);
  const lines = [columns.map((column) => escapeCsvField(column)).join(',')];

  for (const record of records) {
    lines.push(columns.map((column) => escapeCsvField(formatCsvValue(record[column]))).join(','));
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Write records to `filePath` using temp file + rename so readers never see
 * a partial file.
 *
 * @returns Number of data rows written
 */
export async function exportToCsv(
  records: readonly Record<string, unknown>[],
  filePath: string,
  log: Logger = defaultLogger,
): Promise<number> {
  const tempPath = `${filePath}.tmp.${String(Date.now())}`;

  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  await fs.writeFile(tempPath, toCsv(records), 'utf8');
  await fs.rename(tempPath, filePath);

  log.info('Saved records to CSV', { filePath, rows: records.length });
  return records.length;
}
