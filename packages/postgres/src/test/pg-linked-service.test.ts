import { describe, it, expect, vi } from 'vitest';
import { AuthenticationError, AuthorizationError, ConnectionError, createLogger } from '@datalink/core';
import { PgLinkedService, type PgLinkedServiceSettings } from '../pg-linked-service';
import { FakePool, pgError, type Responder } from './fake-pool';

const logger = createLogger({ logLevel: 'silent' });

const settings: PgLinkedServiceSettings = {
  host: 'localhost',
  database: 'analytics',
  user: 'loader',
  password: 'test-secret',
};

function service(respond?: Responder) {
  const pool = new FakePool(respond);
  const poolFactory = vi.fn(() => pool);
  const linkedService = new PgLinkedService({ settings, poolFactory, logger });
  return { pool, poolFactory, linkedService };
}

describe('PgLinkedService', () => {
  it('builds the pool from settings and probes it on connect', async () => {
    const { pool, poolFactory, linkedService } = service();

    await linkedService.connect();

    expect(poolFactory).toHaveBeenCalledWith(settings);
    expect(pool.statements).toEqual(['SELECT 1']);
    expect(linkedService.connected).toBe(true);
    expect(linkedService.connection).toBe(pool);
  });

  it('reports the server version as the health message', async () => {
    const { linkedService } = service(text =>
      text.startsWith('SELECT version()') ? { rows: [{ version: 'PostgreSQL 16.2' }] } : undefined,
    );

    expect(await linkedService.testConnection()).toEqual({ healthy: true, message: 'PostgreSQL 16.2' });
  });

  it('maps rejected credentials to AuthenticationError and ends the pool', async () => {
    const { pool, linkedService } = service(() => pgError('28P01', 'password authentication failed for user "loader"'));

    const err = await linkedService.connect().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AuthenticationError);
    expect(err).toMatchObject({
      message: 'password authentication failed for user "loader"',
      details: { kind: 'DS.RESOURCE.LINKED_SERVICE.POSTGRES', sqlState: '28P01' },
    });
    expect(pool.ended).toBe(true);
    expect(linkedService.connected).toBe(false);
  });

  it('maps missing privileges to AuthorizationError', async () => {
    const { linkedService } = service(() => pgError('42501', 'permission denied for database analytics'));

    await expect(linkedService.connect()).rejects.toBeInstanceOf(AuthorizationError);
  });

  it('maps socket failures to ConnectionError without a SQLSTATE', async () => {
    const { linkedService } = service(() => Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' }));

    const err = await linkedService.connect().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConnectionError);
    expect(err).toMatchObject({ details: { resourceId: linkedService.id, kind: 'DS.RESOURCE.LINKED_SERVICE.POSTGRES' } });
    expect(err).not.toHaveProperty('details.sqlState');
  });

  it('still raises the connect failure when ending the pool fails', async () => {
    const { pool, linkedService } = service(() => pgError('28000', 'no pg_hba.conf entry'));
    pool.end.mockRejectedValueOnce(new Error('pool already ended'));

    await expect(linkedService.connect()).rejects.toBeInstanceOf(AuthenticationError);
  });

  it('reports an unhealthy status when the probe fails after connecting', async () => {
    const { pool, linkedService } = service();
    await linkedService.connect();
    pool.respond = () => pgError('57P01', 'terminating connection due to administrator command');

    expect(await linkedService.testConnection()).toEqual({
      healthy: false,
      message: 'terminating connection due to administrator command',
    });
  });

  it('ends the pool on close, once', async () => {
    const { pool, linkedService } = service();
    await linkedService.connect();

    await linkedService.close();
    await linkedService.close();

    expect(pool.end).toHaveBeenCalledTimes(1);
    expect(() => linkedService.connection).toThrow(ConnectionError);
  });
});
