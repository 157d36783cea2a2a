/**
 * Minimal pool/client surface the provider uses, plus the adapter over a
 * real `pg` Pool. Tests substitute their own PgPool.
 */

import pg from 'pg';
import type { Row } from '@datalink/core';

export interface PgField {
  name: string;
  dataTypeID: number;
}

export interface PgQueryResult {
  rows: Row[];
  rowCount: number | null;
  fields?: PgField[];
}

export interface PgClient {
  query(text: string, values?: unknown[]): Promise<PgQueryResult>;
  release(): void;
}

export interface PgPool {
  query(text: string, values?: unknown[]): Promise<PgQueryResult>;
  connect(): Promise<PgClient>;
  end(): Promise<void>;
}

export function adaptPool(pool: pg.Pool): PgPool {
  return {
    query: (text, values) => pool.query(text, values),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
}

/** Connection options accepted by `pg.Pool`. */
export interface PgConnectionSettings {
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  ssl?: boolean;
  max?: number;
  connectionTimeoutMillis?: number;
  applicationName?: string;
}

export function createPool(settings: PgConnectionSettings): PgPool {
  return adaptPool(
    new pg.Pool({
      connectionString: settings.connectionString,
      host: settings.host,
      port: settings.port,
      database: settings.database,
      user: settings.user,
      password: settings.password,
      ssl: settings.ssl,
      max: settings.max,
      connectionTimeoutMillis: settings.connectionTimeoutMillis ?? 10_000,
      application_name: settings.applicationName ?? 'datalink',
    }),
  );
}

// ── SQL helpers ─────────────────────────────────────────────────

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function qualifiedName(schema: string, table: string): string {
  return `${quoteIdent(schema)}.${quoteIdent(table)}`;
}

/** SQLSTATE of a server error. Socket errors (ECONNREFUSED, …) carry none. */
export function sqlState(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string' && /^(?!E)[0-9A-Z]{5}$/.test(err.code)) {
    return err.code;
  }
  return undefined;
}

/** Result field type OID → schema type name. */
const TYPE_NAMES: Readonly<Record<number, string>> = {
  16: 'boolean',
  20: 'integer',
  21: 'integer',
  23: 'integer',
  25: 'string',
  114: 'object',
  700: 'number',
  701: 'number',
  1042: 'string',
  1043: 'string',
  1082: 'date',
  1114: 'date',
  1184: 'date',
  1700: 'number',
  2950: 'uuid',
  3802: 'object',
};

export function schemaFromFields(fields: readonly PgField[]): Record<string, string> {
  const schema: Record<string, string> = {};
  for (const field of fields) {
    schema[field.name] = TYPE_NAMES[field.dataTypeID] ?? 'unknown';
  }
  return schema;
}
