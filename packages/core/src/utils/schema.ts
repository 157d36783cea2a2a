import type { Row } from '../types/resource';

export type ValueType = 'string' | 'integer' | 'number' | 'boolean' | 'date' | 'array' | 'object' | 'null';

export function inferValueType(value: unknown): ValueType {
  if (value === null || value === undefined) return 'null';
  if (value instanceof Date) return 'date';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'string': return 'string';
    case 'boolean': return 'boolean';
    case 'number': return Number.isInteger(value) ? 'integer' : 'number';
    case 'bigint': return 'integer';
    default: return 'object';
  }
}

/**
 * Column name → type name across a row set.
 *
 * Nulls never decide a type; a column holding only nulls is 'null'.
 * integer widens to number; any other disagreement is 'mixed'.
 * Returns undefined for an empty row set (no column structure to expose).
 */
export function inferSchema(rows: readonly Row[]): Record<string, string> | undefined {
  if (rows.length === 0) return undefined;

  const schema: Record<string, string> = {};
  for (const row of rows) {
    for (const [column, value] of Object.entries(row)) {
      const type = inferValueType(value);
      const current = schema[column];
      if (current === undefined || current === 'null') {
        schema[column] = type;
      } else if (type === 'null' || type === current) {
        continue;
      } else if ((current === 'integer' && type === 'number') || (current === 'number' && type === 'integer')) {
        schema[column] = 'number';
      } else {
        schema[column] = 'mixed';
      }
    }
  }
  return schema;
}
