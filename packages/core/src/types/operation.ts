/**
 * Telemetry recorded for every tracked dataset call.
 */

/** Tracked dataset operations. `close` is deliberately absent: it is not tracked. */
export type DatasetMethod = 'create' | 'read' | 'update' | 'upsert' | 'delete' | 'purge' | 'list' | 'rename';

export const DATASET_METHODS: readonly DatasetMethod[] = [
  'create',
  'read',
  'update',
  'upsert',
  'delete',
  'purge',
  'list',
  'rename',
];

/** Methods that take their rows from `input`. */
export type InputMethod = 'create' | 'update' | 'upsert' | 'delete';

export const INPUT_METHODS: readonly InputMethod[] = ['create', 'update', 'upsert', 'delete'];

/**
 * Structured failure captured from a thrown error.
 */
export interface OperationError {
  readonly message: string;
  readonly code: string;
  readonly statusCode: number;
  readonly details: Record<string, unknown>;
}

/**
 * Report produced by one tracked call.
 *
 * Providers may assign `rowCount`, `schema` or `metadata` while the call runs;
 * `rowCount` left at 0 and `schema` left unset are derived from `output` afterwards.
 */
export interface OperationInfo {
  method: DatasetMethod;
  success: boolean;
  error?: OperationError;
  /** Rows read, written or discovered */
  rowCount: number;
  startedAt: Date;
  endedAt?: Date;
  durationMs: number;
  /** Column name → type name */
  schema?: Record<string, string>;
  metadata: Record<string, unknown>;
}

export function createOperationInfo(method: DatasetMethod, startedAt: Date = new Date()): OperationInfo {
  return {
    method,
    success: false,
    rowCount: 0,
    startedAt,
    durationMs: 0,
    metadata: {},
  };
}

/** JSON-safe rendition of an OperationInfo, for logs and audit trails. */
export interface SerializedOperationInfo {
  readonly method: DatasetMethod;
  readonly success: boolean;
  readonly error: OperationError | null;
  readonly rowCount: number;
  readonly startedAt: string;
  readonly endedAt: string | null;
  readonly durationMs: number;
  readonly schema: Record<string, string> | null;
  readonly metadata: Record<string, unknown>;
}

export function serializeOperationInfo(info: OperationInfo): SerializedOperationInfo {
  return {
    method: info.method,
    success: info.success,
    error: info.error ? { ...info.error, details: { ...info.error.details } } : null,
    rowCount: info.rowCount,
    startedAt: info.startedAt.toISOString(),
    endedAt: info.endedAt ? info.endedAt.toISOString() : null,
    durationMs: info.durationMs,
    schema: info.schema ? { ...info.schema } : null,
    metadata: { ...info.metadata },
  };
}
