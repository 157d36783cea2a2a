/**
 * BaseDataset: the operation state machine every provider runs through.
 *
 * Public methods (`read`, `create`, …) are fixed here; providers implement the
 * protected `execute*` hooks with backend-specific logic only. The base:
 * - hands hooks a private copy of `input`, so caller rows are never mutated
 * - short-circuits null/empty input without touching the backend
 * - rejects inputs above `capabilities.maxBatchSize` (never splits them)
 * - validates identity columns for update/upsert/delete
 * - composes checkpoint handling for read
 * - wraps stray errors into the method's failure kind
 * - records telemetry through `instrument()` and re-throws failures unchanged
 *
 * Every hook except `executeRead` defaults to raising DatasetNotSupportedError.
 */

import type { Dataset, DatasetCapabilities } from '../interfaces/dataset';
import type { LinkedService } from '../interfaces/linked-service';
import type { ResourceEventBus } from '../interfaces/event-bus';
import { isEmptyCheckpoint, type Checkpoint, type DatasetSettings, type ResourceOptions, type Row } from '../types/resource';
import type { DatasetMethod, OperationInfo } from '../types/operation';
import {
  DatasetNotSupportedError,
  NotSupportedError,
  datasetErrorFor,
  isResourceError,
  type DatasetError,
} from '../types/errors';
import { instrument } from './instrument';
import { cloneRows, findDuplicateIdentity, missingIdentityColumns } from '../utils/rows';
import { generateId } from '../utils/id';
import { getLogger, type Logger } from '../utils/logger';

export interface DatasetOptions<TSettings, TConnection> extends ResourceOptions<TSettings> {
  readonly linkedService: LinkedService<TConnection>;
  readonly events?: ResourceEventBus;
  readonly logger?: Logger;
}

/** What a read hook is given. */
export interface ReadRequest {
  /** Copy of the caller's checkpoint; always empty when checkpointing is unsupported */
  readonly checkpoint: Checkpoint;
}

/** What a read hook returns. */
export interface ReadResult {
  /** The fully exhausted result set */
  readonly rows: Row[];
  /** Advanced position; omit to leave the checkpoint as it was */
  readonly checkpoint?: Checkpoint;
}

/**
 * Rows the backend reports for a write, or undefined; the base then copies `input` into `output`.
 */
export type WriteResult = Row[] | undefined;

export abstract class BaseDataset<TSettings extends DatasetSettings, TConnection = unknown>
  implements Dataset<TSettings>
{
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly version: string;
  readonly settings: TSettings;
  readonly linkedService: LinkedService<TConnection>;
  abstract readonly kind: string;
  abstract readonly capabilities: DatasetCapabilities;

  input: readonly Row[] | null = null;
  output: Row[] = [];
  checkpoint: Checkpoint = {};

  protected readonly events?: ResourceEventBus;
  private readonly _logger: Logger;
  private _operation: OperationInfo | undefined;

  constructor(options: DatasetOptions<TSettings, TConnection>) {
    this.id = options.id ?? generateId();
    this.name = options.name ?? this.constructor.name;
    this.description = options.description;
    this.version = options.version ?? '1.0.0';
    this.settings = options.settings;
    this.linkedService = options.linkedService;
    this.events = options.events;
    this._logger = options.logger ?? getLogger();
  }

  get operation(): OperationInfo | undefined {
    return this._operation;
  }

  /**
   * The live record of the call in progress.
   * Hooks may set `rowCount`, `schema` or `metadata` on it.
   */
  protected get currentOperation(): OperationInfo {
    if (!this._operation) {
      throw new Error('No operation in progress');
    }
    return this._operation;
  }

  /** The linked service's handle. Throws ConnectionError when it is not connected. */
  protected get connection(): TConnection {
    return this.linkedService.connection;
  }

  // ── Provider hooks ──────────────────────────────────────────────

  protected abstract executeRead(request: ReadRequest): Promise<ReadResult>;

  protected async executeCreate(_rows: Row[]): Promise<WriteResult> {
    throw this.notSupported('create');
  }

  protected async executeUpdate(_rows: Row[], _identity: readonly string[]): Promise<WriteResult> {
    throw this.notSupported('update');
  }

  protected async executeUpsert(_rows: Row[], _identity: readonly string[]): Promise<WriteResult> {
    throw this.notSupported('upsert');
  }

  protected async executeDelete(_rows: Row[], _identity: readonly string[]): Promise<WriteResult> {
    throw this.notSupported('delete');
  }

  protected async executePurge(): Promise<void> {
    throw this.notSupported('purge');
  }

  protected async executeList(): Promise<Row[]> {
    throw this.notSupported('list');
  }

  protected async executeRename(_newName: string): Promise<void> {
    throw this.notSupported('rename');
  }

  /** Release dataset-held resources. The linked service is not closed: it is shared. */
  protected async dispose(): Promise<void> {}

  // ── Contract ────────────────────────────────────────────────────

  async read(): Promise<void> {
    await this.track('read', async () => {
      const supported = this.capabilities.supportsCheckpoint;
      const checkpoint = supported ? structuredClone(this.checkpoint) : {};
      if (supported && isEmptyCheckpoint(checkpoint)) {
        this.log.debug('full load');
      }
      const result = await this.executeRead({ checkpoint });
      this.output = result.rows;
      if (supported && result.checkpoint) {
        this.checkpoint = structuredClone(result.checkpoint);
      }
    });
  }

  async create(): Promise<void> {
    await this.track('create', async () => {
      const rows = this.takeInput('create');
      if (!rows) return;
      this.output = (await this.executeCreate(rows)) ?? this.copyInput();
    });
  }

  async update(): Promise<void> {
    await this.track('update', async () => {
      const rows = this.takeInput('update');
      if (!rows) return;
      const identity = this.requireIdentity('update', rows);
      this.output = (await this.executeUpdate(rows, identity)) ?? this.copyInput();
    });
  }

  async upsert(): Promise<void> {
    await this.track('upsert', async () => {
      const rows = this.takeInput('upsert');
      if (!rows) return;
      const identity = this.requireIdentity('upsert', rows);
      this.output = (await this.executeUpsert(rows, identity)) ?? this.copyInput();
    });
  }

  async delete(): Promise<void> {
    await this.track('delete', async () => {
      const rows = this.takeInput('delete');
      if (!rows) return;
      const identity = this.requireIdentity('delete', rows);
      this.output = (await this.executeDelete(rows, identity)) ?? this.copyInput();
    });
  }

  async purge(): Promise<void> {
    await this.track('purge', () => this.executePurge());
  }

  async list(): Promise<void> {
    await this.track('list', async () => {
      this.output = await this.executeList();
    });
  }

  async rename(newName: string): Promise<void> {
    await this.track('rename', () => this.executeRename(newName));
  }

  async close(): Promise<void> {
    await this.dispose();
  }

  // ── Helpers for providers ───────────────────────────────────────

  /** A failure of the method's documented kind, with this dataset's context attached. */
  protected failure(method: DatasetMethod, message: string, details: Record<string, unknown> = {}, cause?: unknown): DatasetError {
    const ErrorKind = datasetErrorFor(method);
    return new ErrorKind({
      message,
      details: { ...details, resourceId: this.id, kind: this.kind },
      cause,
    });
  }

  protected notSupported(method: DatasetMethod): DatasetNotSupportedError {
    return new DatasetNotSupportedError({
      message: `${this.kind} does not support ${method}()`,
      details: { resourceId: this.id, kind: this.kind, method },
    });
  }

  // ── Internal ────────────────────────────────────────────────────

  private async track(method: DatasetMethod, work: () => Promise<void>): Promise<void> {
    this.output = [];
    this.events?.onOperationStarted?.({ resourceId: this.id, kind: this.kind, method });

    const outcome = await instrument({
      method,
      work: async operation => {
        this._operation = operation;
        try {
          await work();
        } catch (err) {
          throw this.toBoundaryError(method, err);
        }
      },
      output: () => this.output,
    });
    this._operation = outcome.operation;

    const { durationMs, rowCount, error } = outcome.operation;
    if (outcome.ok) {
      this.log.debug({ method, rowCount, durationMs }, 'operation completed');
      this.events?.onOperationCompleted?.({ resourceId: this.id, kind: this.kind, method, rowCount, durationMs });
      return;
    }

    if (error) {
      this.log.warn({ method, durationMs, code: error.code, details: error.details }, error.message);
      this.events?.onOperationFailed?.({ resourceId: this.id, kind: this.kind, method, durationMs, error });
    }
    throw outcome.error;
  }

  /**
   * Keep the method's failure kind and "not supported" as they are;
   * wrap anything else so raw backend errors never cross the contract.
   */
  private toBoundaryError(method: DatasetMethod, err: unknown): unknown {
    const ErrorKind = datasetErrorFor(method);
    if (err instanceof ErrorKind || err instanceof NotSupportedError) {
      return err;
    }
    const message = err instanceof Error ? err.message : String(err);
    return this.failure(method, message || `${method} failed`, {
      ...(isResourceError(err) ? { ...err.details, causeCode: err.code } : {}),
    }, err);
  }

  /** Deep copy of `input`, or null when there is nothing to do. Enforces capacity. */
  private takeInput(method: DatasetMethod): Row[] | null {
    if (!this.input || this.input.length === 0) {
      return null;
    }
    const limit = this.capabilities.maxBatchSize;
    if (limit !== undefined && this.input.length > limit) {
      throw this.failure(method, `Input of ${this.input.length} rows exceeds the batch limit of ${limit}`, {
        limit,
        rowCount: this.input.length,
      });
    }
    return cloneRows(this.input);
  }

  private copyInput(): Row[] {
    return this.input ? cloneRows(this.input) : [];
  }

  private requireIdentity(method: DatasetMethod, rows: readonly Row[]): readonly string[] {
    const identity = this.settings.identityColumns;
    if (!identity || identity.length === 0) {
      throw this.failure(method, `${method}() requires identityColumns in the dataset settings`);
    }

    for (let i = 0; i < rows.length; i++) {
      const missing = missingIdentityColumns(rows[i], identity);
      if (missing.length > 0) {
        throw this.failure(method, `Row ${i} has no value for identity column(s) ${missing.join(', ')}`, {
          rowIndex: i,
          identityColumns: [...identity],
        });
      }
    }

    const duplicate = findDuplicateIdentity(rows, identity);
    if (duplicate !== -1) {
      throw this.failure(method, `Row ${duplicate} repeats the identity of an earlier row`, {
        rowIndex: duplicate,
        identityColumns: [...identity],
      });
    }
    return [...identity];
  }

  protected get log(): Logger {
    return this._logger.child({ kind: this.kind, resourceId: this.id });
  }
}
