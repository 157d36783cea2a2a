import type { DatasetMethod, OperationError } from '../types/operation';

/**
 * Optional event publishing.
 * Linked services, datasets and the registry report lifecycle transitions here.
 * All methods are optional; subscribe only to what you need.
 *
 * Categories:
 * - Connection lifecycle: connect, close
 * - Operation lifecycle: start, complete, fail
 * - Registry: provider registration
 */
export interface ResourceEventBus {
  // ── Connection Lifecycle ──────────────────────────────────────────
  onConnected?(e: { resourceId: string; kind: string }): void;
  onConnectionClosed?(e: { resourceId: string; kind: string }): void;

  // ── Operation Lifecycle ───────────────────────────────────────────
  onOperationStarted?(e: { resourceId: string; kind: string; method: DatasetMethod }): void;
  onOperationCompleted?(e: {
    resourceId: string;
    kind: string;
    method: DatasetMethod;
    rowCount: number;
    durationMs: number;
  }): void;
  onOperationFailed?(e: {
    resourceId: string;
    kind: string;
    method: DatasetMethod;
    durationMs: number;
    error: OperationError;
  }): void;

  // ── Registry ──────────────────────────────────────────────────────
  onResourceRegistered?(e: { provider: string; kind: string; version: string; resource: 'linked_service' | 'dataset' }): void;
}
