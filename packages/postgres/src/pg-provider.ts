import { MismatchedLinkedServiceError, defineDataset, defineLinkedService, type ProviderManifest } from '@datalink/core';
import type { PgPool } from './pool';
import { PG_LINKED_SERVICE_KIND, PgLinkedService, type PgLinkedServiceSettings } from './pg-linked-service';
import { PG_TABLE_DATASET_KIND, PgTableDataset, type PgTableDatasetSettings } from './pg-table-dataset';

export interface PgProviderOptions {
  /** Replaces the real `pg.Pool` for every linked service built from this manifest. */
  readonly poolFactory?: (settings: PgLinkedServiceSettings) => PgPool;
}

const identifier = { type: 'string', minLength: 1, maxLength: 63 } as const;

export function pgProvider(options: PgProviderOptions = {}): ProviderManifest {
  return {
    name: 'postgres',
    description: 'Postgres tables over a pg connection pool',
    linkedServices: [
      defineLinkedService<PgLinkedServiceSettings>({
        info: { kind: PG_LINKED_SERVICE_KIND, name: 'PgLinkedService', version: '1.0.0' },
        settingsSchema: {
          type: 'object',
          properties: {
            connectionString: { type: 'string' },
            host: { type: 'string' },
            port: { type: 'integer', minimum: 1, maximum: 65535 },
            database: { type: 'string' },
            user: { type: 'string' },
            password: { type: 'string' },
            ssl: { type: 'boolean' },
            max: { type: 'integer', minimum: 1 },
            connectionTimeoutMillis: { type: 'integer', minimum: 0 },
            applicationName: { type: 'string' },
          },
          additionalProperties: false,
        },
        create: resource => new PgLinkedService({ ...resource, poolFactory: options.poolFactory }),
      }),
    ],
    datasets: [
      defineDataset<PgTableDatasetSettings>({
        info: { kind: PG_TABLE_DATASET_KIND, name: 'PgTableDataset', version: '1.0.0' },
        linkedServiceKind: PG_LINKED_SERVICE_KIND,
        settingsSchema: {
          type: 'object',
          required: ['table'],
          properties: {
            schema: identifier,
            table: identifier,
            identityColumns: { type: 'array', items: identifier, uniqueItems: true },
            columns: { type: 'array', items: identifier, uniqueItems: true },
            checkpointColumn: identifier,
            pageSize: { type: 'integer', minimum: 1 },
            maxBatchSize: { type: 'integer', minimum: 1 },
            strictUpdate: { type: 'boolean' },
          },
          additionalProperties: false,
        },
        create: (resource, linkedService) => {
          if (!(linkedService instanceof PgLinkedService)) {
            throw new MismatchedLinkedServiceError({
              message: `${PG_TABLE_DATASET_KIND} requires a PgLinkedService`,
              details: { expected: PG_LINKED_SERVICE_KIND, actual: linkedService.kind },
            });
          }
          return new PgTableDataset({ ...resource, linkedService });
        },
      }),
    ],
  };
}
