import type { Row } from '@datalink/core';
import type { PgQueryResult } from '../pool';
import { pgError, type Responder } from './fake-pool';

const TARGET = '"(?:[^"]|"")+"\\."((?:[^"]|"")+)"';

const SELECT = new RegExp(
  `^SELECT (.+?) FROM ${TARGET}(?: WHERE "((?:[^"]|"")+)" > \\$1)?(?: ORDER BY (.+?))? LIMIT \\$(\\d+) OFFSET \\$(\\d+)$`,
);
const UPSERT = new RegExp(
  `^INSERT INTO ${TARGET} \\((.+?)\\) VALUES \\((.+?)\\) ON CONFLICT \\((.+?)\\) DO UPDATE SET (.+) RETURNING \\*$`,
);
const INSERT = new RegExp(`^INSERT INTO ${TARGET} \\((.+?)\\) VALUES (.+) RETURNING \\*$`);
const UPDATE = new RegExp(`^UPDATE ${TARGET} SET (.+) WHERE (.+) RETURNING \\*$`);
const DELETE = new RegExp(`^DELETE FROM ${TARGET} WHERE \\((.+?)\\) IN \\((.+)\\)$`);
const TRUNCATE = new RegExp(`^TRUNCATE TABLE ${TARGET}$`);
const RENAME = new RegExp(`^ALTER TABLE ${TARGET} RENAME TO "((?:[^"]|"")+)"$`);

function idents(text: string): string[] {
  return [...text.matchAll(/"((?:[^"]|"")+)"/g)].map(m => m[1].replace(/""/g, '"'));
}

/** `($1, $2), ($3, DEFAULT)` → slot lists */
function tuples(text: string): string[][] {
  return text.replace(/^\(|\)$/g, '').split('), (').map(tuple => tuple.split(', '));
}

function compare(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a) < String(b) ? -1 : String(a) > String(b) ? 1 : 0;
}

function isNull(value: unknown): boolean {
  return value === null || value === undefined;
}

/**
 * In-process tables answering the statements PgTableDataset issues,
 * with primary-key checks and BEGIN/ROLLBACK snapshots.
 */
export class FakeTables {
  readonly tables = new Map<string, Row[]>();
  private readonly primaryKey: readonly string[];
  private snapshot?: Map<string, Row[]>;

  constructor(primaryKey: readonly string[]) {
    this.primaryKey = primaryKey;
  }

  create(name: string, rows: Row[] = []): void {
    this.tables.set(name, rows.map(row => ({ ...row })));
  }

  readonly respond: Responder = (text, values) => {
    try {
      return this.run(text, values);
    } catch (err) {
      return err instanceof Error ? err : new Error(String(err));
    }
  };

  private run(text: string, values: unknown[]): Partial<PgQueryResult> | undefined {
    const slot = (ref: string): unknown => values[Number(ref.slice(1)) - 1];
    let m: RegExpMatchArray | null;

    if (text === 'SELECT 1') return { rows: [{ '?column?': 1 }] };
    if (text.startsWith('SELECT version()')) return { rows: [{ version: 'PostgreSQL 16.2' }] };
    if (text.startsWith('BEGIN')) {
      this.snapshot = new Map([...this.tables].map(([name, rows]) => [name, rows.map(row => ({ ...row }))]));
      return undefined;
    }
    if (text === 'COMMIT') {
      this.snapshot = undefined;
      return undefined;
    }
    if (text === 'ROLLBACK') {
      if (this.snapshot) {
        this.tables.clear();
        for (const [name, rows] of this.snapshot) this.tables.set(name, rows);
      }
      this.snapshot = undefined;
      return undefined;
    }
    if (text.includes('information_schema.tables')) {
      return { rows: [...this.tables.keys()].sort().map(name => ({ name, type: 'BASE TABLE' })) };
    }

    if ((m = text.match(TRUNCATE))) {
      this.table(m[1]).length = 0;
      return undefined;
    }

    if ((m = text.match(RENAME))) {
      const [, from, to] = m;
      const rows = this.table(from);
      if (this.tables.has(to)) throw pgError('42P07', `relation "${to}" already exists`);
      this.tables.delete(from);
      this.tables.set(to, rows);
      return undefined;
    }

    if ((m = text.match(SELECT))) {
      const [, projection, name, after, orderBy, limit, offset] = m;
      let rows = this.table(name);
      if (after !== undefined) {
        rows = rows.filter(row => !isNull(row[after]) && compare(row[after], values[0]) > 0);
      }
      const order = orderBy === undefined ? [] : idents(orderBy);
      const sorted = [...rows].sort((a, b) => {
        for (const col of order) {
          if (isNull(a[col]) !== isNull(b[col])) return isNull(a[col]) ? 1 : -1;
          const diff = compare(a[col], b[col]);
          if (diff !== 0) return diff;
        }
        return 0;
      });
      const start = Number(slot(`$${offset}`));
      const page = sorted.slice(start, start + Number(slot(`$${limit}`)));
      const columns = projection === '*' ? undefined : idents(projection);
      return {
        rows: page.map(row => (columns ? Object.fromEntries(columns.map(col => [col, row[col]])) : { ...row })),
      };
    }

    if ((m = text.match(UPSERT))) {
      const [, name, columnList, slots, conflictList, assignments] = m;
      const rows = this.table(name);
      const columns = idents(columnList);
      const incoming: Row = Object.fromEntries(columns.map((col, i) => [col, slot(slots.split(', ')[i])]));
      const conflict = idents(conflictList);
      const existing = rows.find(row => conflict.every(col => row[col] === incoming[col]));
      if (!existing) {
        rows.push(incoming);
        return { rows: [{ ...incoming }] };
      }
      for (const col of assignments.split(', ').map(assignment => idents(assignment)[0])) {
        existing[col] = incoming[col];
      }
      return { rows: [{ ...existing }] };
    }

    if ((m = text.match(INSERT))) {
      const [, name, columnList, valueList] = m;
      const rows = this.table(name);
      const columns = idents(columnList);
      const inserted = tuples(valueList).map(tuple => {
        const row: Row = {};
        tuple.forEach((ref, i) => {
          if (ref !== 'DEFAULT') row[columns[i]] = slot(ref);
        });
        return row;
      });
      for (const row of inserted) {
        if ([...rows, ...inserted.slice(0, inserted.indexOf(row))].some(other => this.sameKey(other, row))) {
          throw pgError('23505', `duplicate key value violates unique constraint "${name}_pkey"`);
        }
      }
      rows.push(...inserted);
      return { rows: inserted.map(row => ({ ...row })) };
    }

    if ((m = text.match(UPDATE))) {
      const [, name, setList, whereList] = m;
      const match = whereList.split(' AND ').map(cond => [idents(cond)[0], slot(cond.split(' = ')[1])] as const);
      const row = this.table(name).find(candidate => match.every(([col, value]) => candidate[col] === value));
      if (!row) return { rows: [], rowCount: 0 };
      for (const assignment of setList.split(', ')) {
        const [target, source] = assignment.split(' = ');
        if (source.startsWith('$')) row[idents(target)[0]] = slot(source);
      }
      return { rows: [{ ...row }] };
    }

    if ((m = text.match(DELETE))) {
      const [, name, keyList, valueList] = m;
      const rows = this.table(name);
      const key = idents(keyList);
      const doomed = tuples(valueList).map(tuple => tuple.map(slot));
      const kept = rows.filter(row => !doomed.some(values => key.every((col, i) => row[col] === values[i])));
      const deleted = rows.length - kept.length;
      rows.splice(0, rows.length, ...kept);
      return { rows: [], rowCount: deleted };
    }

    throw new Error(`Unexpected statement: ${text}`);
  }

  private table(name: string): Row[] {
    const rows = this.tables.get(name);
    if (!rows) throw pgError('42P01', `relation "${name}" does not exist`);
    return rows;
  }

  private sameKey(a: Row, b: Row): boolean {
    return this.primaryKey.every(col => a[col] === b[col]);
  }
}
