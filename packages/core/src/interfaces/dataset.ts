import type { Checkpoint, DatasetSettings, Row } from '../types/resource';
import type { OperationInfo } from '../types/operation';
import type { LinkedService } from './linked-service';

/**
 * Declared provider capabilities.
 */
export interface DatasetCapabilities {
  /** When false, any checkpoint the caller sets is ignored and read() is a full load. */
  readonly supportsCheckpoint: boolean;
  /** Maximum rows per atomic write call. Larger inputs fail; they are never split. */
  readonly maxBatchSize?: number;
  /** What update() does with rows that do not exist. Never inserts. */
  readonly missingRowPolicy: 'ignore' | 'raise';
}

/**
 * One backend-resident data resource plus the request/response state of one operation.
 *
 * Callers set `input` / `checkpoint`, invoke one method, then read
 * `output` / `checkpoint` / `operation`. Calls on one instance must be serialized.
 */
export interface Dataset<TSettings extends DatasetSettings = DatasetSettings> {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly version: string;
  readonly kind: string;
  readonly settings: TSettings;
  /** Shared, not owned. The dataset never calls connect() on it. */
  readonly linkedService: LinkedService;
  readonly capabilities: DatasetCapabilities;

  /** Caller-supplied rows. Never mutated by a method. */
  input: readonly Row[] | null;
  /** Result rows of the last call. Empty after purge and rename. */
  output: Row[];
  checkpoint: Checkpoint;
  /** Telemetry of the last tracked call. */
  readonly operation: OperationInfo | undefined;

  /** Materialize the configured scope (narrowed by checkpoint when supported). */
  read(): Promise<void>;
  /** Insert `input`. Atomic. Not idempotent. */
  create(): Promise<void>;
  /** Update existing rows matched by identity columns. Atomic. Idempotent. */
  update(): Promise<void>;
  /** Insert or update rows matched by identity columns. Atomic. Idempotent. */
  upsert(): Promise<void>;
  /** Remove rows matched by identity columns. Atomic. Idempotent. */
  delete(): Promise<void>;
  /** Remove all content of the target. Idempotent. */
  purge(): Promise<void>;
  /** Discover available resources. */
  list(): Promise<void>;
  /** Rename the target. Atomic. Not idempotent. */
  rename(newName: string): Promise<void>;
  /** Release dataset-held resources. Not tracked. */
  close(): Promise<void>;
}
