import { BaseDataset, type DatasetOptions, type ReadRequest, type ReadResult, type WriteResult } from '../resource/dataset';
import type { DatasetCapabilities } from '../interfaces/dataset';
import type { Checkpoint, DatasetSettings, Row } from '../types/resource';
import type { DatasetMethod } from '../types/operation';
import type { DatasetError } from '../types/errors';
import { cloneRows, identityKey } from '../utils/rows';
import { MemoryBackendError } from './memory-backend';
import type { MemoryConnection } from './memory-linked-service';

export const MEMORY_DATASET_KIND = 'DS.RESOURCE.DATASET.MEMORY';

const DEFAULT_PAGE_SIZE = 500;

export interface MemoryDatasetSettings extends DatasetSettings {
  /** Target table */
  readonly table: string;
  /** Column that orders increments. Setting it enables checkpointing. */
  readonly checkpointColumn?: string;
  /** Static lower bound on `checkpointColumn` (inclusive) */
  readonly since?: string | number;
  readonly pageSize?: number;
  readonly maxBatchSize?: number;
  /** update() raises on rows that do not exist instead of skipping them */
  readonly strictUpdate?: boolean;
}

/** Checkpoint shape: the highest `column` value seen so far. */
export interface MemoryCheckpoint extends Checkpoint {
  column: string;
  value: string | number;
}

export function isMemoryCheckpoint(value: Checkpoint): value is MemoryCheckpoint {
  return typeof value.column === 'string' && (typeof value.value === 'string' || typeof value.value === 'number');
}

function asNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/** Numeric when either side is a number and both read as numbers; lexical otherwise. */
function compareValues(a: unknown, b: unknown): number {
  if (typeof a === 'number' || typeof b === 'number') {
    const left = asNumber(a);
    const right = asNumber(b);
    if (left !== undefined && right !== undefined) return left - right;
  }
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

export type MemoryDatasetOptions = DatasetOptions<MemoryDatasetSettings, MemoryConnection>;

/**
 * Dataset over one MemoryBackend table.
 *
 * Rows are matched on `identityColumns`. Reads page through the table and,
 * with `checkpointColumn` set, return only rows past the checkpoint.
 */
export class MemoryDataset extends BaseDataset<MemoryDatasetSettings, MemoryConnection> {
  readonly kind = MEMORY_DATASET_KIND;
  readonly capabilities: DatasetCapabilities;

  constructor(options: MemoryDatasetOptions) {
    super(options);
    this.capabilities = {
      supportsCheckpoint: options.settings.checkpointColumn !== undefined,
      maxBatchSize: options.settings.maxBatchSize,
      missingRowPolicy: options.settings.strictUpdate ? 'raise' : 'ignore',
    };
  }

  protected async executeRead(request: ReadRequest): Promise<ReadResult> {
    const { backend } = this.connection;
    const { table, checkpointColumn, since } = this.settings;
    const pageSize = this.settings.pageSize ?? DEFAULT_PAGE_SIZE;

    const after = checkpointColumn && isMemoryCheckpoint(request.checkpoint) && request.checkpoint.column === checkpointColumn
      ? request.checkpoint.value
      : undefined;

    // Rows without a checkpoint value only drop out once a lower bound applies.
    const where = checkpointColumn && (after !== undefined || since !== undefined)
      ? (row: Row) => {
          const value = row[checkpointColumn];
          if (value === undefined || value === null) return false;
          if (since !== undefined && compareValues(value, since) < 0) return false;
          return after === undefined || compareValues(value, after) > 0;
        }
      : undefined;

    const rows: Row[] = [];
    let pages = 0;
    try {
      for (;;) {
        const page = backend.page(table, { offset: rows.length, limit: pageSize, where });
        pages++;
        rows.push(...page);
        if (page.length < pageSize) break;
      }
    } catch (err) {
      throw this.backendFailure('read', err, { table, rowsRead: rows.length });
    }
    this.currentOperation.metadata.pages = pages;

    if (!checkpointColumn || rows.length === 0) {
      return { rows };
    }
    let highest = after;
    for (const row of rows) {
      const value = row[checkpointColumn];
      if ((typeof value === 'string' || typeof value === 'number') && (highest === undefined || compareValues(value, highest) > 0)) {
        highest = value;
      }
    }
    const checkpoint: MemoryCheckpoint | undefined = highest === undefined ? undefined : { column: checkpointColumn, value: highest };
    return { rows, checkpoint };
  }

  protected async executeCreate(rows: Row[]): Promise<WriteResult> {
    const identity = this.settings.identityColumns ?? [];
    return this.write('create', rows, stored => {
      const existing = new Set(identity.length > 0 ? stored.map(row => identityKey(row, identity)) : []);
      for (const row of rows) {
        if (identity.length > 0) {
          const key = identityKey(row, identity);
          if (existing.has(key)) {
            throw new MemoryBackendError('DUPLICATE_KEY', `Row with identity ${key} already exists`);
          }
          existing.add(key);
        }
        stored.push(row);
      }
      return cloneRows(rows);
    });
  }

  protected async executeUpdate(rows: Row[], identity: readonly string[]): Promise<WriteResult> {
    return this.write('update', rows, stored => {
      const index = this.indexRows(stored, identity);
      const updated: Row[] = [];
      for (const row of rows) {
        const position = index.get(identityKey(row, identity));
        if (position === undefined) {
          if (this.capabilities.missingRowPolicy === 'raise') {
            throw new MemoryBackendError('ROW_NOT_FOUND', `No row with identity ${identityKey(row, identity)}`);
          }
          continue;
        }
        stored[position] = { ...stored[position], ...row };
        updated.push(stored[position]);
      }
      return cloneRows(updated);
    });
  }

  protected async executeUpsert(rows: Row[], identity: readonly string[]): Promise<WriteResult> {
    return this.write('upsert', rows, stored => {
      const index = this.indexRows(stored, identity);
      const written = rows.map(row => {
        const position = index.get(identityKey(row, identity));
        if (position === undefined) {
          stored.push(row);
          return row;
        }
        stored[position] = { ...stored[position], ...row };
        return stored[position];
      });
      return cloneRows(written);
    });
  }

  protected async executeDelete(rows: Row[], identity: readonly string[]): Promise<WriteResult> {
    await this.write('delete', rows, stored => {
      const doomed = new Set(rows.map(row => identityKey(row, identity)));
      const kept = stored.filter(row => !doomed.has(identityKey(row, identity)));
      this.currentOperation.metadata.deleted = stored.length - kept.length;
      stored.splice(0, stored.length, ...kept);
    });
    return undefined;
  }

  protected async executePurge(): Promise<void> {
    const { backend } = this.connection;
    try {
      backend.truncate(this.settings.table);
    } catch (err) {
      throw this.backendFailure('purge', err, { table: this.settings.table });
    }
  }

  protected async executeList(): Promise<Row[]> {
    const { backend } = this.connection;
    try {
      return backend.listTables().map(summary => ({ name: summary.name, type: 'table', rowCount: summary.rowCount }));
    } catch (err) {
      throw this.backendFailure('list', err);
    }
  }

  protected async executeRename(newName: string): Promise<void> {
    const { backend } = this.connection;
    try {
      backend.rename(this.settings.table, newName);
    } catch (err) {
      throw this.backendFailure('rename', err, { table: this.settings.table, newName });
    }
  }

  // ── Internal ────────────────────────────────────────────────────

  private async write<T>(method: DatasetMethod, rows: Row[], fn: (stored: Row[]) => T): Promise<T> {
    const { backend } = this.connection;
    try {
      return backend.transaction(this.settings.table, fn);
    } catch (err) {
      throw this.backendFailure(method, err, { table: this.settings.table, rowCount: rows.length });
    }
  }

  private indexRows(stored: readonly Row[], identity: readonly string[]): Map<string, number> {
    const index = new Map<string, number>();
    stored.forEach((row, position) => index.set(identityKey(row, identity), position));
    return index;
  }

  private backendFailure(method: DatasetMethod, err: unknown, details: Record<string, unknown> = {}): DatasetError {
    const message = err instanceof Error ? err.message : String(err);
    return this.failure(method, message, {
      ...details,
      ...(err instanceof MemoryBackendError ? { backendCode: err.code } : {}),
    }, err);
  }
}
