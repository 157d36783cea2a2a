/**
 * Instrumentation
 *
 * Runs one dataset operation as a unit of work and composes its telemetry.
 * The outcome carries either the value or the error, never both; the error is
 * passed through untouched so the caller can re-throw it.
 *
 * ```typescript
 * const outcome = await instrument({
 *   method: 'read',
 *   work: async (operation) => { ...; operation.metadata.pages = 3; },
 *   output: () => rows,
 * });
 * if (!outcome.ok) throw outcome.error;
 * ```
 */

import { performance } from 'node:perf_hooks';
import { createOperationInfo, type DatasetMethod, type OperationError, type OperationInfo } from '../types/operation';
import { isResourceError } from '../types/errors';
import { inferSchema } from '../utils/schema';

export type TrackedOutcome<T> =
  | { readonly ok: true; readonly value: T; readonly operation: OperationInfo }
  | { readonly ok: false; readonly error: unknown; readonly operation: OperationInfo };

export interface InstrumentOptions<T> {
  readonly method: DatasetMethod;
  /** The operation. Receives the live record so it can set rowCount, schema or metadata. */
  readonly work: (operation: OperationInfo) => Promise<T>;
  /** Read after the work settles; rowCount and schema are derived from it. */
  readonly output?: () => unknown;
}

export async function instrument<T>(options: InstrumentOptions<T>): Promise<TrackedOutcome<T>> {
  const operation = createOperationInfo(options.method, new Date());
  const started = performance.now();

  let outcome: TrackedOutcome<T>;
  try {
    const value = await options.work(operation);
    operation.success = true;
    deriveFromOutput(operation, options.output?.());
    outcome = { ok: true, value, operation };
  } catch (error) {
    operation.success = false;
    operation.error = toOperationError(error);
    outcome = { ok: false, error, operation };
  } finally {
    const elapsed = performance.now() - started;
    operation.durationMs = Math.max(0, Math.round(elapsed * 1000) / 1000);
    operation.endedAt = new Date(Math.max(Date.now(), operation.startedAt.getTime()));
  }
  return outcome;
}

/**
 * Structured error detail from anything thrown.
 * The message is never empty.
 */
export function toOperationError(error: unknown): OperationError {
  if (isResourceError(error)) {
    return {
      message: error.message || error.code,
      code: error.code,
      statusCode: error.statusCode,
      details: { ...error.details },
    };
  }
  if (error instanceof Error) {
    return {
      message: error.message || error.name,
      code: error.name,
      statusCode: 500,
      details: {},
    };
  }
  const message = String(error);
  return {
    message: message || 'Operation failed',
    code: 'UNKNOWN_ERROR',
    statusCode: 500,
    details: {},
  };
}

function isRowArray(value: unknown): value is Record<string, unknown>[] {
  return Array.isArray(value) && value.every(item => typeof item === 'object' && item !== null && !Array.isArray(item));
}

function deriveFromOutput(operation: OperationInfo, output: unknown): void {
  if (operation.rowCount === 0 && Array.isArray(output)) {
    operation.rowCount = output.length;
  }
  if (operation.schema === undefined && isRowArray(output)) {
    operation.schema = inferSchema(output);
  }
}
