import { describe, it, expect } from 'vitest';
import {
  DeserializationError,
  MemoryBackend,
  MismatchedLinkedServiceError,
  ResourceRegistry,
  createLogger,
  memoryProvider,
} from '@datalink/core';
import { pgProvider } from '../pg-provider';
import { PgLinkedService } from '../pg-linked-service';
import { PgTableDataset } from '../pg-table-dataset';
import { FakePool } from './fake-pool';

const logger = createLogger({ logLevel: 'silent' });

const LS_KIND = 'DS.RESOURCE.LINKED_SERVICE.POSTGRES';
const DS_KIND = 'DS.RESOURCE.DATASET.POSTGRES_TABLE';

describe('pgProvider', () => {
  function registry(pool = new FakePool()) {
    const reg = new ResourceRegistry({ logger });
    reg.register(pgProvider({ poolFactory: () => pool }));
    return reg;
  }

  it('builds a connected table dataset from configuration', async () => {
    const pool = new FakePool();
    const reg = registry(pool);

    const service = reg.linkedService({ kind: LS_KIND, settings: { host: 'db.internal', port: 5432, password: 'test-secret' } });
    const dataset = reg.dataset({ kind: DS_KIND, settings: { schema: 'sales', table: 'orders', identityColumns: ['id'] } }, service);
    await service.connect();
    await dataset.purge();

    expect(service).toBeInstanceOf(PgLinkedService);
    expect(dataset).toBeInstanceOf(PgTableDataset);
    expect(pool.statements).toEqual(['SELECT 1', 'TRUNCATE TABLE "sales"."orders"']);
  });

  it('rejects settings outside the schema', () => {
    const reg = registry();

    expect(() => reg.linkedService({ kind: LS_KIND, settings: { port: 70000 } })).toThrow(DeserializationError);

    const service = reg.linkedService({ kind: LS_KIND, settings: {} });
    let caught: unknown;
    try {
      reg.dataset({ kind: DS_KIND, settings: { table: 'orders', pageSize: 0 } }, service);
    } catch (e) {
      caught = e;
    }
    expect(caught).toMatchObject({ details: { errors: ['/pageSize must be >= 1'] } });
  });

  it('refuses a linked service of another kind', () => {
    const reg = registry();
    reg.register(memoryProvider(new MemoryBackend()));
    const memory = reg.linkedService({ kind: 'DS.RESOURCE.LINKED_SERVICE.MEMORY', settings: {} });

    expect(() => reg.dataset({ kind: DS_KIND, settings: { table: 'orders' } }, memory)).toThrow(MismatchedLinkedServiceError);
  });
});
