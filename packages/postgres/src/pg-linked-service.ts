import {
  AuthenticationError,
  AuthorizationError,
  BaseLinkedService,
  ConnectionError,
  type LinkedServiceError,
  type LinkedServiceOptions,
} from '@datalink/core';
import { createPool, sqlState, type PgConnectionSettings, type PgPool } from './pool';

export const PG_LINKED_SERVICE_KIND = 'DS.RESOURCE.LINKED_SERVICE.POSTGRES';

export interface PgLinkedServiceSettings extends PgConnectionSettings, Record<string, unknown> {}

export interface PgLinkedServiceOptions extends LinkedServiceOptions<PgLinkedServiceSettings> {
  /** Builds the pool from settings. Defaults to a real `pg.Pool`. */
  readonly poolFactory?: (settings: PgLinkedServiceSettings) => PgPool;
}

/** SQLSTATE classes for rejected credentials and missing privileges. */
const AUTHENTICATION_STATES = new Set(['28000', '28P01']);
const AUTHORIZATION_STATES = new Set(['42501']);

/**
 * Linked service over a Postgres connection pool.
 *
 * connect() builds the pool and proves it with `SELECT 1`; a pool that fails
 * that probe is ended before the error is raised.
 */
export class PgLinkedService extends BaseLinkedService<PgLinkedServiceSettings, PgPool> {
  readonly kind = PG_LINKED_SERVICE_KIND;
  private readonly poolFactory: (settings: PgLinkedServiceSettings) => PgPool;

  constructor(options: PgLinkedServiceOptions) {
    super(options);
    this.poolFactory = options.poolFactory ?? createPool;
  }

  protected async open(): Promise<PgPool> {
    const pool = this.poolFactory(this.settings);
    try {
      await pool.query('SELECT 1');
      return pool;
    } catch (err) {
      await pool.end().catch((endErr: unknown) => {
        this.log.warn({ err: endErr }, 'failed to end pool after a failed connect');
      });
      throw this.classify(err);
    }
  }

  protected async release(pool: PgPool): Promise<void> {
    await pool.end();
  }

  protected async ping(pool: PgPool): Promise<string> {
    try {
      const { rows } = await pool.query('SELECT version() AS version');
      const version = rows[0]?.version;
      return typeof version === 'string' ? version : 'Postgres reachable';
    } catch (err) {
      throw this.classify(err);
    }
  }

  /** Map a driver error onto the linked-service taxonomy by SQLSTATE. */
  classify(err: unknown): LinkedServiceError {
    const state = sqlState(err);
    const options = {
      message: err instanceof Error ? err.message : String(err),
      details: { resourceId: this.id, kind: this.kind, ...(state ? { sqlState: state } : {}) },
      cause: err,
    };
    if (state && AUTHENTICATION_STATES.has(state)) return new AuthenticationError(options);
    if (state && AUTHORIZATION_STATES.has(state)) return new AuthorizationError(options);
    return new ConnectionError(options);
  }
}
