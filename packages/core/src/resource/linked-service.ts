/**
 * BaseLinkedService: connection lifecycle shared by every provider.
 *
 * Providers implement three hooks:
 * - `open()` builds and authenticates a handle
 * - `release(handle)` tears it down
 * - `ping(handle)` runs a cheap liveness query
 *
 * The base stores the handle, guards the `connection` accessor,
 * turns contract failures from `ping()` into an unhealthy status,
 * and makes `close()` safe to repeat.
 */

import type { ConnectionStatus, LinkedService } from '../interfaces/linked-service';
import type { ResourceEventBus } from '../interfaces/event-bus';
import type { LinkedServiceSettings, ResourceOptions } from '../types/resource';
import { ConnectionError, isResourceError, type ResourceError } from '../types/errors';
import { generateId } from '../utils/id';
import { getLogger, type Logger } from '../utils/logger';

export interface LinkedServiceOptions<TSettings> extends ResourceOptions<TSettings> {
  readonly events?: ResourceEventBus;
  readonly logger?: Logger;
}

export abstract class BaseLinkedService<TSettings extends LinkedServiceSettings, TConnection>
  implements LinkedService<TConnection, TSettings>
{
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly version: string;
  readonly settings: TSettings;
  abstract readonly kind: string;

  protected readonly events?: ResourceEventBus;
  private readonly _logger: Logger;
  private _handle: TConnection | undefined;
  private _connected = false;

  constructor(options: LinkedServiceOptions<TSettings>) {
    this.id = options.id ?? generateId();
    this.name = options.name ?? this.constructor.name;
    this.description = options.description;
    this.version = options.version ?? '1.0.0';
    this.settings = options.settings;
    this.events = options.events;
    this._logger = options.logger ?? getLogger();
  }

  // ── Provider hooks ──────────────────────────────────────────────

  /**
   * Build and authenticate a handle from `settings`.
   * Throw ConnectionError / AuthenticationError; anything else is wrapped as ConnectionError.
   */
  protected abstract open(): Promise<TConnection>;

  /** Tear down a handle returned by open(). */
  protected abstract release(handle: TConnection): Promise<void>;

  /**
   * Liveness query against an open handle.
   * Throw a ResourceError to report an unhealthy backend.
   */
  protected abstract ping(handle: TConnection): Promise<string | undefined>;

  // ── Contract ────────────────────────────────────────────────────

  get connected(): boolean {
    return this._connected;
  }

  get connection(): TConnection {
    if (!this._connected || this._handle === undefined) {
      throw new ConnectionError({
        message: `Linked service "${this.name}" is not connected; call connect() first`,
        details: { resourceId: this.id, kind: this.kind },
      });
    }
    return this._handle;
  }

  async connect(): Promise<void> {
    if (this._connected) {
      await this.close();
    }

    let handle: TConnection;
    try {
      handle = await this.open();
    } catch (err) {
      this.log.debug({ err }, 'connect failed');
      throw this.connectionFailure(err);
    }

    this._handle = handle;
    this._connected = true;
    this.log.debug('connected');
    this.events?.onConnected?.({ resourceId: this.id, kind: this.kind });
  }

  async testConnection(): Promise<ConnectionStatus> {
    try {
      if (!this._connected) {
        await this.connect();
      }
      const message = await this.ping(this.connection);
      return { healthy: true, message: message ?? 'Connection is healthy' };
    } catch (err) {
      if (isResourceError(err)) {
        return { healthy: false, message: err.message };
      }
      throw err;
    }
  }

  async close(): Promise<void> {
    const handle = this._handle;
    this._handle = undefined;
    if (!this._connected || handle === undefined) {
      this._connected = false;
      return;
    }
    this._connected = false;

    try {
      await this.release(handle);
    } catch (err) {
      this.log.warn({ err }, 'release failed');
      throw this.connectionFailure(err);
    }
    this.log.debug('connection closed');
    this.events?.onConnectionClosed?.({ resourceId: this.id, kind: this.kind });
  }

  /**
   * Scoped acquisition: connect, run `fn`, always close.
   */
  use<T>(fn: (service: this) => Promise<T>): Promise<T> {
    return withLinkedService(this, fn);
  }

  private connectionFailure(err: unknown): ResourceError {
    if (isResourceError(err)) return err;
    return new ConnectionError({
      message: err instanceof Error ? err.message : String(err),
      details: { resourceId: this.id, kind: this.kind },
      cause: err,
    });
  }

  protected get log(): Logger {
    return this._logger.child({ kind: this.kind, resourceId: this.id });
  }
}

/**
 * Connect `service`, run `fn`, and close the service on every path.
 */
export async function withLinkedService<S extends LinkedService, T>(service: S, fn: (service: S) => Promise<T>): Promise<T> {
  try {
    await service.connect();
    return await fn(service);
  } finally {
    await service.close();
  }
}
