import {
  BaseDataset,
  isResourceError,
  type Checkpoint,
  type DatasetCapabilities,
  type DatasetError,
  type DatasetMethod,
  type DatasetOptions,
  type DatasetSettings,
  type ReadRequest,
  type ReadResult,
  type Row,
  type WriteResult,
} from '@datalink/core';
import { qualifiedName, quoteIdent, schemaFromFields, sqlState, type PgClient, type PgPool } from './pool';

export const PG_TABLE_DATASET_KIND = 'DS.RESOURCE.DATASET.POSTGRES_TABLE';

const DEFAULT_PAGE_SIZE = 1000;

export interface PgTableDatasetSettings extends DatasetSettings {
  /** Defaults to "public" */
  readonly schema?: string;
  readonly table: string;
  /** Columns read() selects. All columns when omitted. */
  readonly columns?: readonly string[];
  /** Monotonic column that orders increments. Setting it enables checkpointing. */
  readonly checkpointColumn?: string;
  readonly pageSize?: number;
  readonly maxBatchSize?: number;
  /** update() raises on rows that match nothing instead of skipping them */
  readonly strictUpdate?: boolean;
}

/** Highest `column` value read so far. Timestamps are kept as ISO strings. */
export interface PgCheckpoint extends Checkpoint {
  column: string;
  value: string | number;
}

export function isPgCheckpoint(value: Checkpoint): value is PgCheckpoint {
  return typeof value.column === 'string' && (typeof value.value === 'string' || typeof value.value === 'number');
}

function checkpointValue(value: unknown): string | number | undefined {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'bigint') return value.toString();
  return undefined;
}

interface Statement {
  text: string;
  values: unknown[];
}

export type PgTableDatasetOptions = DatasetOptions<PgTableDatasetSettings, PgPool>;

/**
 * Dataset over one Postgres table.
 *
 * Reads run in a read-only REPEATABLE READ transaction and page with
 * LIMIT/OFFSET in checkpoint-then-identity order, so every page sees the
 * same snapshot. Each write method runs in one transaction.
 */
export class PgTableDataset extends BaseDataset<PgTableDatasetSettings, PgPool> {
  readonly kind = PG_TABLE_DATASET_KIND;
  readonly capabilities: DatasetCapabilities;

  constructor(options: PgTableDatasetOptions) {
    super(options);
    this.capabilities = {
      supportsCheckpoint: options.settings.checkpointColumn !== undefined,
      maxBatchSize: options.settings.maxBatchSize,
      missingRowPolicy: options.settings.strictUpdate ? 'raise' : 'ignore',
    };
  }

  private get target(): string {
    return qualifiedName(this.settings.schema ?? 'public', this.settings.table);
  }

  protected async executeRead(request: ReadRequest): Promise<ReadResult> {
    const { checkpointColumn, columns } = this.settings;
    const pageSize = this.settings.pageSize ?? DEFAULT_PAGE_SIZE;

    const after = checkpointColumn && isPgCheckpoint(request.checkpoint) && request.checkpoint.column === checkpointColumn
      ? request.checkpoint.value
      : undefined;

    const projection = columns && columns.length > 0 ? columns.map(quoteIdent).join(', ') : '*';
    const order = [checkpointColumn, ...(this.settings.identityColumns ?? [])]
      .filter((col): col is string => col !== undefined)
      .map(quoteIdent);
    const params: unknown[] = after === undefined ? [] : [after];
    const where = after === undefined || !checkpointColumn ? '' : ` WHERE ${quoteIdent(checkpointColumn)} > $1`;
    const orderBy = order.length > 0 ? ` ORDER BY ${order.join(', ')}` : '';
    const base = `SELECT ${projection} FROM ${this.target}${where}${orderBy}`;

    let pages = 0;
    const rows = await this.transaction('read', 'BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY', { table: this.settings.table }, async client => {
      const collected: Row[] = [];
      for (;;) {
        const n = params.length;
        const result = await client.query(`${base} LIMIT $${n + 1} OFFSET $${n + 2}`, [...params, pageSize, collected.length]);
        pages++;
        if (pages === 1 && result.fields) {
          this.currentOperation.schema = schemaFromFields(result.fields);
        }
        collected.push(...result.rows);
        if (result.rows.length < pageSize) return collected;
      }
    });
    this.currentOperation.metadata.pages = pages;

    if (!checkpointColumn || rows.length === 0) {
      return { rows };
    }
    // Ascending order puts NULLs last; the highest value is the last non-null one.
    for (let i = rows.length - 1; i >= 0; i--) {
      const value = checkpointValue(rows[i][checkpointColumn]);
      if (value !== undefined) {
        return { rows, checkpoint: { column: checkpointColumn, value } satisfies PgCheckpoint };
      }
    }
    return { rows };
  }

  protected async executeCreate(rows: Row[]): Promise<WriteResult> {
    const statement = this.insertStatement(rows);
    return this.transaction('create', 'BEGIN', { table: this.settings.table, rowCount: rows.length }, async client => {
      const result = await client.query(statement.text, statement.values);
      return result.rows;
    });
  }

  protected async executeUpdate(rows: Row[], identity: readonly string[]): Promise<WriteResult> {
    return this.transaction('update', 'BEGIN', { table: this.settings.table, rowCount: rows.length }, async client => {
      const updated: Row[] = [];
      for (let i = 0; i < rows.length; i++) {
        const statement = this.updateStatement(rows[i], identity);
        const result = await client.query(statement.text, statement.values);
        if ((result.rowCount ?? 0) === 0 && this.capabilities.missingRowPolicy === 'raise') {
          throw this.failure('update', `Row ${i} matches no existing row`, {
            table: this.settings.table,
            rowIndex: i,
            identityColumns: [...identity],
          });
        }
        updated.push(...result.rows);
      }
      return updated;
    });
  }

  protected async executeUpsert(rows: Row[], identity: readonly string[]): Promise<WriteResult> {
    return this.transaction('upsert', 'BEGIN', { table: this.settings.table, rowCount: rows.length }, async client => {
      const written: Row[] = [];
      for (const row of rows) {
        const statement = this.upsertStatement(row, identity);
        const result = await client.query(statement.text, statement.values);
        written.push(...result.rows);
      }
      return written;
    });
  }

  protected async executeDelete(rows: Row[], identity: readonly string[]): Promise<WriteResult> {
    const values: unknown[] = [];
    const tuples = rows.map(row => {
      const slots = identity.map(col => {
        values.push(row[col]);
        return `$${values.length}`;
      });
      return `(${slots.join(', ')})`;
    });
    const key = `(${identity.map(quoteIdent).join(', ')})`;
    const text = `DELETE FROM ${this.target} WHERE ${key} IN (${tuples.join(', ')})`;

    const deleted = await this.transaction('delete', 'BEGIN', { table: this.settings.table, rowCount: rows.length }, async client => {
      const result = await client.query(text, values);
      return result.rowCount ?? 0;
    });
    this.currentOperation.metadata.deleted = deleted;
    return undefined;
  }

  protected async executePurge(): Promise<void> {
    try {
      await this.connection.query(`TRUNCATE TABLE ${this.target}`);
    } catch (err) {
      throw this.backendFailure('purge', err, { table: this.settings.table });
    }
  }

  protected async executeList(): Promise<Row[]> {
    const schema = this.settings.schema ?? 'public';
    try {
      const { rows } = await this.connection.query(
        `SELECT table_name AS name, table_type AS type
         FROM information_schema.tables
         WHERE table_schema = $1
         ORDER BY table_name`,
        [schema],
      );
      return rows.map(row => ({
        name: row.name,
        schema,
        type: row.type === 'VIEW' ? 'view' : 'table',
      }));
    } catch (err) {
      throw this.backendFailure('list', err, { schema });
    }
  }

  protected async executeRename(newName: string): Promise<void> {
    try {
      await this.connection.query(`ALTER TABLE ${this.target} RENAME TO ${quoteIdent(newName)}`);
    } catch (err) {
      throw this.backendFailure('rename', err, { table: this.settings.table, newName });
    }
  }

  // ── SQL ─────────────────────────────────────────────────────────

  /** Multi-row INSERT over the union of row keys; absent keys take the column DEFAULT. */
  private insertStatement(rows: readonly Row[]): Statement {
    const columns = [...new Set(rows.flatMap(row => Object.keys(row)))];
    const values: unknown[] = [];
    const tuples = rows.map(row => {
      const slots = columns.map(col => {
        if (!(col in row)) return 'DEFAULT';
        values.push(row[col]);
        return `$${values.length}`;
      });
      return `(${slots.join(', ')})`;
    });
    return {
      text: `INSERT INTO ${this.target} (${columns.map(quoteIdent).join(', ')}) VALUES ${tuples.join(', ')} RETURNING *`,
      values,
    };
  }

  private updateStatement(row: Row, identity: readonly string[]): Statement {
    const values: unknown[] = [];
    const changed = Object.keys(row).filter(col => !identity.includes(col));
    const assignments = changed.length > 0
      ? changed.map(col => {
          values.push(row[col]);
          return `${quoteIdent(col)} = $${values.length}`;
        })
      : [`${quoteIdent(identity[0])} = ${quoteIdent(identity[0])}`];
    const match = identity.map(col => {
      values.push(row[col]);
      return `${quoteIdent(col)} = $${values.length}`;
    });
    return {
      text: `UPDATE ${this.target} SET ${assignments.join(', ')} WHERE ${match.join(' AND ')} RETURNING *`,
      values,
    };
  }

  private upsertStatement(row: Row, identity: readonly string[]): Statement {
    const columns = Object.keys(row);
    const values = columns.map(col => row[col]);
    const changed = columns.filter(col => !identity.includes(col));
    const assignments = (changed.length > 0 ? changed : [identity[0]])
      .map(col => `${quoteIdent(col)} = EXCLUDED.${quoteIdent(col)}`);
    return {
      text:
        `INSERT INTO ${this.target} (${columns.map(quoteIdent).join(', ')}) ` +
        `VALUES (${columns.map((_, i) => `$${i + 1}`).join(', ')}) ` +
        `ON CONFLICT (${identity.map(quoteIdent).join(', ')}) DO UPDATE SET ${assignments.join(', ')} RETURNING *`,
      values,
    };
  }

  // ── Internal ────────────────────────────────────────────────────

  /**
   * Run `fn` on one pooled client between `begin` and COMMIT.
   * Rolls back on any error; contract errors pass through, driver errors become the method's failure.
   */
  private async transaction<T>(
    method: DatasetMethod,
    begin: string,
    details: Record<string, unknown>,
    fn: (client: PgClient) => Promise<T>,
  ): Promise<T> {
    let client: PgClient;
    try {
      client = await this.connection.connect();
    } catch (err) {
      throw isResourceError(err) ? err : this.backendFailure(method, err, details);
    }

    try {
      await client.query(begin);
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        this.log.warn({ err: rollbackErr, method }, 'rollback failed');
      });
      throw isResourceError(err) ? err : this.backendFailure(method, err, details);
    } finally {
      client.release();
    }
  }

  private backendFailure(method: DatasetMethod, err: unknown, details: Record<string, unknown> = {}): DatasetError {
    const state = sqlState(err);
    const message = err instanceof Error ? err.message : String(err);
    return this.failure(method, message, { ...details, ...(state ? { sqlState: state } : {}) }, err);
  }
}
