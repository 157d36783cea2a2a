import type { LinkedServiceSettings } from '../types/resource';

/**
 * Outcome of a liveness check. A failed check is reported here, never thrown.
 */
export interface ConnectionStatus {
  readonly healthy: boolean;
  readonly message: string;
}

/**
 * A bound, authenticated backend endpoint.
 * One instance binds to exactly one endpoint; the handle type is backend-specific.
 */
export interface LinkedService<TConnection = unknown, TSettings extends LinkedServiceSettings = LinkedServiceSettings> {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly version: string;
  /** e.g. "DS.RESOURCE.LINKED_SERVICE.POSTGRES" */
  readonly kind: string;
  readonly settings: TSettings;

  /** True between a successful connect() and close(). */
  readonly connected: boolean;

  /**
   * Establish and store the backend handle.
   * Idempotent: calling again re-establishes it.
   * @throws ConnectionError when unreachable, AuthenticationError when credentials are rejected
   */
  connect(): Promise<void>;

  /**
   * The stored handle.
   * @throws ConnectionError if connect() has not succeeded
   */
  readonly connection: TConnection;

  /** Cheap liveness check. Resolves unhealthy instead of rejecting. */
  testConnection(): Promise<ConnectionStatus>;

  /** Release the handle. No-op when already closed or never connected. */
  close(): Promise<void>;
}
