import type { Row } from '../types/resource';

/** Deep copy of a row set. Providers operate on copies so caller input stays untouched. */
export function cloneRows(rows: readonly Row[]): Row[] {
  return structuredClone(rows.map(row => ({ ...row })));
}

/**
 * Stable key for a row's identity tuple.
 * Two rows with the same values in the identity columns produce the same key.
 */
export function identityKey(row: Row, columns: readonly string[]): string {
  return JSON.stringify(columns.map(column => row[column] ?? null));
}

/** Identity columns a row carries no value for (undefined or null). */
export function missingIdentityColumns(row: Row, columns: readonly string[]): string[] {
  return columns.filter(column => row[column] === undefined || row[column] === null);
}

/**
 * Index of the first row whose identity repeats an earlier row, or -1.
 */
export function findDuplicateIdentity(rows: readonly Row[], columns: readonly string[]): number {
  const seen = new Set<string>();
  for (let i = 0; i < rows.length; i++) {
    const key = identityKey(rows[i], columns);
    if (seen.has(key)) return i;
    seen.add(key);
  }
  return -1;
}
