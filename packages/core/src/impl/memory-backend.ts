/**
 * In-memory backend: a tiny table engine the memory provider talks to.
 *
 * Holds named tables of rows. Writes go through `transaction()`, which works
 * on a copy of the table and swaps it in only when the callback returns.
 * Tests can take the backend offline, count calls, and queue one-shot faults.
 */

import type { Row } from '../types/resource';
import { cloneRows } from '../utils/rows';

export type MemoryBackendOperation = 'connect' | 'ping' | 'read' | 'write' | 'truncate' | 'list' | 'rename';

/** Raw failure raised by the backend. `code` mimics a driver error code. */
export class MemoryBackendError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'MemoryBackendError';
    this.code = code;
  }
}

export interface MemoryBackendOptions {
  /** When set, connections must present this token. */
  accessToken?: string;
  /** Tables to create up front. */
  tables?: Record<string, Row[]>;
}

export interface PageRequest {
  offset: number;
  limit: number;
  where?: (row: Row) => boolean;
}

export interface TableSummary {
  name: string;
  rowCount: number;
}

export class MemoryBackend {
  /** Every backend call increments this, including failed ones. */
  calls = 0;
  online = true;

  private readonly accessToken?: string;
  private readonly tables = new Map<string, Row[]>();
  private readonly faults = new Map<MemoryBackendOperation, Error>();

  constructor(options: MemoryBackendOptions = {}) {
    this.accessToken = options.accessToken;
    for (const [name, rows] of Object.entries(options.tables ?? {})) {
      this.tables.set(name, cloneRows(rows));
    }
  }

  // ── Session ─────────────────────────────────────────────────────

  /** Returns false when the token is rejected. */
  authenticate(token: string | undefined): boolean {
    this.enter('connect');
    return this.accessToken === undefined || this.accessToken === token;
  }

  ping(): number {
    this.enter('ping');
    return this.tables.size;
  }

  // ── Tables ──────────────────────────────────────────────────────

  createTable(name: string, rows: Row[] = []): void {
    if (this.tables.has(name)) {
      throw new MemoryBackendError('TABLE_EXISTS', `Table "${name}" already exists`);
    }
    this.tables.set(name, cloneRows(rows));
  }

  dropTable(name: string): void {
    this.tables.delete(name);
  }

  hasTable(name: string): boolean {
    return this.tables.has(name);
  }

  /** Copy of a table's rows, for assertions. Does not count as a call. */
  snapshot(name: string): Row[] {
    return cloneRows(this.table(name));
  }

  listTables(): TableSummary[] {
    this.enter('list');
    return [...this.tables.entries()]
      .map(([name, rows]) => ({ name, rowCount: rows.length }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  // ── Data ────────────────────────────────────────────────────────

  page(name: string, request: PageRequest): Row[] {
    this.enter('read');
    const rows = request.where ? this.table(name).filter(request.where) : this.table(name);
    return cloneRows(rows.slice(request.offset, request.offset + request.limit));
  }

  /**
   * Run `fn` against a working copy of the table.
   * The copy replaces the table only if `fn` returns; a throw leaves the table as it was.
   */
  transaction<T>(name: string, fn: (rows: Row[]) => T): T {
    this.enter('write');
    const working = cloneRows(this.table(name));
    const result = fn(working);
    this.tables.set(name, working);
    return result;
  }

  truncate(name: string): void {
    this.enter('truncate');
    this.table(name);
    this.tables.set(name, []);
  }

  rename(from: string, to: string): void {
    this.enter('rename');
    const rows = this.table(from);
    if (this.tables.has(to)) {
      throw new MemoryBackendError('TABLE_EXISTS', `Table "${to}" already exists`);
    }
    this.tables.delete(from);
    this.tables.set(to, rows);
  }

  // ── Test controls ───────────────────────────────────────────────

  /** Make the next call of `operation` throw `error`. */
  failNext(operation: MemoryBackendOperation, error: Error = new MemoryBackendError('FAULT', `Injected ${operation} fault`)): void {
    this.faults.set(operation, error);
  }

  reset(): void {
    this.calls = 0;
    this.online = true;
    this.faults.clear();
  }

  // ── Internal ────────────────────────────────────────────────────

  private enter(operation: MemoryBackendOperation): void {
    this.calls++;
    if (!this.online) {
      throw new MemoryBackendError('UNAVAILABLE', 'Memory backend is offline');
    }
    const fault = this.faults.get(operation);
    if (fault) {
      this.faults.delete(operation);
      throw fault;
    }
  }

  private table(name: string): Row[] {
    const rows = this.tables.get(name);
    if (!rows) {
      throw new MemoryBackendError('TABLE_NOT_FOUND', `Table "${name}" does not exist`);
    }
    return rows;
  }
}
