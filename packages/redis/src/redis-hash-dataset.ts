import {
  BaseDataset,
  findDuplicateIdentity,
  identityKey,
  isResourceError,
  missingIdentityColumns,
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
import type { HashClient, HashWrite } from './hash-client';

export const REDIS_HASH_DATASET_KIND = 'DS.RESOURCE.DATASET.REDIS_HASH';

const DEFAULT_KEY_PREFIX = 'datalink:';
const DEFAULT_MAX_BATCH_SIZE = 100;
const MAX_ATTEMPTS = 3;

export interface RedisHashDatasetSettings extends DatasetSettings {
  /** Hash name, stored under `keyPrefix` */
  readonly hash: string;
  readonly keyPrefix?: string;
  readonly maxBatchSize?: number;
  readonly strictUpdate?: boolean;
}

export type RedisHashDatasetOptions = DatasetOptions<RedisHashDatasetSettings, HashClient>;

/**
 * Dataset over one Redis hash. Each row is a JSON value under a field
 * derived from its identity columns, so every method needs identityColumns.
 *
 * Writes WATCH the hash and commit in one MULTI, retrying a few times when
 * another client interferes. There is no ordering to resume from: read()
 * is always a full load.
 */
export class RedisHashDataset extends BaseDataset<RedisHashDatasetSettings, HashClient> {
  readonly kind = REDIS_HASH_DATASET_KIND;
  readonly capabilities: DatasetCapabilities;

  constructor(options: RedisHashDatasetOptions) {
    super(options);
    this.capabilities = {
      supportsCheckpoint: false,
      maxBatchSize: options.settings.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE,
      missingRowPolicy: options.settings.strictUpdate ? 'raise' : 'ignore',
    };
  }

  private get prefix(): string {
    return this.settings.keyPrefix ?? DEFAULT_KEY_PREFIX;
  }

  private get key(): string {
    return `${this.prefix}${this.settings.hash}`;
  }

  protected async executeRead(_request: ReadRequest): Promise<ReadResult> {
    let hash: Record<string, string>;
    try {
      hash = await this.connection.hGetAll(this.key);
    } catch (err) {
      throw this.backendFailure('read', err);
    }

    const rows: Row[] = [];
    for (const field of Object.keys(hash).sort()) {
      rows.push(this.decode('read', field, hash[field]));
    }
    return { rows };
  }

  protected async executeCreate(rows: Row[]): Promise<WriteResult> {
    const identity = this.identity('create');
    rows.forEach((row, i) => {
      const missing = missingIdentityColumns(row, identity);
      if (missing.length > 0) {
        throw this.failure('create', `Row ${i} has no value for identity column(s) ${missing.join(', ')}`, { rowIndex: i });
      }
    });
    const duplicate = findDuplicateIdentity(rows, identity);
    if (duplicate !== -1) {
      throw this.failure('create', `Row ${duplicate} repeats the identity of an earlier row`, { rowIndex: duplicate });
    }
    const fields = rows.map(row => identityKey(row, identity));
    await this.apply('create', fields, current => {
      const taken = current.findIndex(value => value !== null);
      if (taken !== -1) {
        throw this.failure('create', `Row with identity ${fields[taken]} already exists`, { hash: this.settings.hash, rowIndex: taken });
      }
      return { set: this.encode(fields, rows) };
    });
    return undefined;
  }

  protected async executeUpdate(rows: Row[], identity: readonly string[]): Promise<WriteResult> {
    const fields = rows.map(row => identityKey(row, identity));
    let updated: Row[] = [];
    await this.apply('update', fields, current => {
      updated = [];
      const changed: string[] = [];
      current.forEach((stored, i) => {
        if (stored === null) {
          if (this.capabilities.missingRowPolicy === 'raise') {
            throw this.failure('update', `Row ${i} matches no existing row`, { hash: this.settings.hash, rowIndex: i });
          }
          return;
        }
        changed.push(fields[i]);
        updated.push({ ...this.decode('update', fields[i], stored), ...rows[i] });
      });
      return { set: this.encode(changed, updated) };
    });
    return updated;
  }

  protected async executeUpsert(rows: Row[], identity: readonly string[]): Promise<WriteResult> {
    const fields = rows.map(row => identityKey(row, identity));
    let written: Row[] = [];
    await this.apply('upsert', fields, current => {
      written = current.map((stored, i) => (stored === null ? rows[i] : { ...this.decode('upsert', fields[i], stored), ...rows[i] }));
      return { set: this.encode(fields, written) };
    });
    return written;
  }

  protected async executeDelete(rows: Row[], identity: readonly string[]): Promise<WriteResult> {
    const fields = rows.map(row => identityKey(row, identity));
    await this.apply('delete', fields, current => {
      this.currentOperation.metadata.deleted = current.filter(value => value !== null).length;
      return { del: fields };
    });
    return undefined;
  }

  protected async executePurge(): Promise<void> {
    try {
      await this.connection.del(this.key);
    } catch (err) {
      throw this.backendFailure('purge', err);
    }
  }

  protected async executeList(): Promise<Row[]> {
    const client = this.connection;
    try {
      const keys = (await client.scan(`${this.prefix}*`)).sort();
      const rows: Row[] = [];
      for (const key of keys) {
        rows.push({ name: key.slice(this.prefix.length), type: 'hash', rowCount: await client.hLen(key) });
      }
      return rows;
    } catch (err) {
      throw this.backendFailure('list', err);
    }
  }

  protected async executeRename(newName: string): Promise<void> {
    let renamed: boolean;
    try {
      renamed = await this.connection.renameNx(this.key, `${this.prefix}${newName}`);
    } catch (err) {
      throw this.backendFailure('rename', err, { newName });
    }
    if (!renamed) {
      throw this.failure('rename', `Hash "${newName}" already exists`, { hash: this.settings.hash, newName });
    }
  }

  // ── Internal ────────────────────────────────────────────────────

  private identity(method: DatasetMethod): readonly string[] {
    const identity = this.settings.identityColumns;
    if (!identity || identity.length === 0) {
      throw this.failure(method, `${method}() requires identityColumns in the dataset settings`);
    }
    return identity;
  }

  private encode(fields: readonly string[], rows: readonly Row[]): Record<string, string> {
    const values: Record<string, string> = {};
    fields.forEach((field, i) => {
      values[field] = JSON.stringify(rows[i]);
    });
    return values;
  }

  private decode(method: DatasetMethod, field: string, value: string): Row {
    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch (err) {
      throw this.failure(method, `Field ${field} does not hold a JSON row`, { hash: this.settings.hash, field }, err);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw this.failure(method, `Field ${field} does not hold a JSON row`, { hash: this.settings.hash, field });
    }
    return { ...parsed };
  }

  /** WATCH/MULTI with bounded retries on contention. */
  private async apply(method: DatasetMethod, fields: readonly string[], plan: (current: Array<string | null>) => HashWrite): Promise<void> {
    const client = this.connection;
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      let committed: boolean;
      try {
        committed = await client.atomicUpdate(this.key, fields, plan);
      } catch (err) {
        throw isResourceError(err) ? err : this.backendFailure(method, err);
      }
      if (committed) {
        this.currentOperation.metadata.attempts = attempt;
        return;
      }
      this.log.debug({ method, attempt }, 'hash changed during write; retrying');
    }
    throw this.failure(method, `Hash "${this.settings.hash}" kept changing; gave up after ${MAX_ATTEMPTS} attempts`, {
      hash: this.settings.hash,
      attempts: MAX_ATTEMPTS,
    });
  }

  private backendFailure(method: DatasetMethod, err: unknown, details: Record<string, unknown> = {}): DatasetError {
    const message = err instanceof Error ? err.message : String(err);
    return this.failure(method, message, { ...details, hash: this.settings.hash }, err);
  }
}
