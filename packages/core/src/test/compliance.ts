/**
 * Dataset compliance suite
 *
 * Drives any provider through the Dataset contract against whatever
 * substitute backend the hooks wire up. Call it from a test file:
 *
 * ```typescript
 * import { describeDatasetCompliance } from '@datalink/core/test';
 *
 * describeDatasetCompliance('RedisHashDataset', {
 *   async makeDataset() { ... },          // connected, target existing
 *   sampleRows: count => makeRows(count ?? 3),
 * });
 * ```
 *
 * A method that raises NotSupportedError skips the checks that need it.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Dataset } from '../interfaces/dataset';
import type { Row } from '../types/resource';
import { INPUT_METHODS, type DatasetMethod, type InputMethod } from '../types/operation';
import { NotSupportedError, datasetErrorFor } from '../types/errors';
import { generateId } from '../utils/id';

export interface DatasetComplianceHooks {
  /** A dataset whose linked service is connected and whose target exists (possibly empty). */
  makeDataset(): Promise<Dataset>;
  /**
   * Rows valid for the dataset: `count` rows with distinct identities when given,
   * at least two otherwise. Successive calls return the same identities.
   */
  sampleRows(count?: number): Row[];
  /** Target name for rename(). Defaults to a random name. */
  renameTarget?(dataset: Dataset): string;
  /** Cleanup. The linked service may already be closed. */
  teardown?(dataset: Dataset): Promise<void>;
}

type IdentityMethod = Exclude<InputMethod, 'create'>;

/** The part of vitest's test context the suite uses. */
interface SkippableContext {
  skip(): void;
}

const IDENTITY_METHODS: readonly IdentityMethod[] = ['update', 'upsert', 'delete'];

/** Run a contract call; skip the test when the provider does not support it. */
async function attempt(ctx: SkippableContext, run: () => Promise<void>): Promise<unknown> {
  try {
    return await run();
  } catch (err) {
    if (err instanceof NotSupportedError) {
      ctx.skip();
    }
    throw err;
  }
}

function invoke(dataset: Dataset, method: InputMethod): Promise<void> {
  switch (method) {
    case 'create': return dataset.create();
    case 'update': return dataset.update();
    case 'upsert': return dataset.upsert();
    case 'delete': return dataset.delete();
  }
}

/** Order-insensitive fingerprint of a row set. */
function fingerprint(rows: readonly Row[]): string[] {
  return rows.map(row => JSON.stringify(row, Object.keys(row).sort())).sort();
}

/** Full load of the target, leaving the caller's checkpoint as it was. */
async function readState(dataset: Dataset): Promise<string[]> {
  const saved = dataset.checkpoint;
  dataset.checkpoint = {};
  await dataset.read();
  const state = fingerprint(dataset.output);
  dataset.checkpoint = saved;
  return state;
}

async function seed(ctx: SkippableContext, dataset: Dataset, rows: Row[]): Promise<void> {
  dataset.input = structuredClone(rows);
  await attempt(ctx, () => dataset.create());
}

function expectTimed(dataset: Dataset, method: DatasetMethod): void {
  const op = dataset.operation;
  expect(op).toBeDefined();
  if (!op) return;
  expect(op.method).toBe(method);
  expect(op.endedAt).toBeInstanceOf(Date);
  expect(op.endedAt?.getTime()).toBeGreaterThanOrEqual(op.startedAt.getTime());
  expect(op.durationMs).toBeGreaterThanOrEqual(0);
}

function expectFailed(dataset: Dataset, method: DatasetMethod): void {
  expectTimed(dataset, method);
  expect(dataset.operation?.success).toBe(false);
  expect(dataset.operation?.error?.message).toBeTruthy();
}

export function describeDatasetCompliance(name: string, hooks: DatasetComplianceHooks): void {
  describe(`${name} dataset contract`, () => {
    let dataset: Dataset;

    beforeEach(async () => {
      dataset = await hooks.makeDataset();
    });

    afterEach(async () => {
      await hooks.teardown?.(dataset);
    });

    // ── Inputs and outputs ───────────────────────────────────────

    it('create writes every input row and leaves input untouched', async (ctx) => {
      const rows = hooks.sampleRows();
      dataset.input = rows;
      const before = structuredClone(rows);

      expect(await attempt(ctx, () => dataset.create())).toBeUndefined();

      expect(dataset.output).toHaveLength(rows.length);
      expect(dataset.input).toEqual(before);
    });

    for (const method of IDENTITY_METHODS) {
      it(`${method} reports every matched row and leaves input untouched`, async (ctx) => {
        const rows = hooks.sampleRows();
        await seed(ctx, dataset, rows);

        dataset.input = structuredClone(rows);
        const before = structuredClone(rows);
        expect(await attempt(ctx, () => invoke(dataset, method))).toBeUndefined();

        expect(dataset.output).toHaveLength(rows.length);
        expect(dataset.input).toEqual(before);
      });
    }

    for (const method of INPUT_METHODS) {
      for (const input of [[], null]) {
        it(`${method} with ${input === null ? 'null' : 'empty'} input is a no-op`, async (ctx) => {
          await seed(ctx, dataset, hooks.sampleRows());
          const before = await readState(dataset);

          dataset.input = input;
          expect(await attempt(ctx, () => invoke(dataset, method))).toBeUndefined();

          expect(dataset.operation?.success).toBe(true);
          expect(dataset.operation?.rowCount).toBe(0);
          expect(dataset.output).toEqual([]);
          expect(await readState(dataset)).toEqual(before);
        });
      }
    }

    // ── Telemetry ────────────────────────────────────────────────

    it('records telemetry for a successful call', async (ctx) => {
      dataset.input = hooks.sampleRows();
      await attempt(ctx, () => dataset.create());

      expectTimed(dataset, 'create');
      expect(dataset.operation?.success).toBe(true);
      expect(dataset.operation?.error).toBeUndefined();
      expect(dataset.operation?.rowCount).toBe(dataset.output.length);

      await dataset.read();
      expectTimed(dataset, 'read');
      expect(dataset.operation?.success).toBe(true);
      expect(dataset.operation?.rowCount).toBe(dataset.output.length);
    });

    it('records telemetry and raises the method failure when the linked service is closed', async (ctx) => {
      await seed(ctx, dataset, hooks.sampleRows());
      await dataset.linkedService.close();

      await expect(dataset.read()).rejects.toBeInstanceOf(datasetErrorFor('read'));
      expectFailed(dataset, 'read');

      dataset.input = hooks.sampleRows();
      await expect(dataset.create()).rejects.toBeInstanceOf(datasetErrorFor('create'));
      expectFailed(dataset, 'create');
      expect(dataset.output).toEqual([]);
    });

    for (const method of IDENTITY_METHODS) {
      it(`${method} rejects rows with duplicate identities`, async (ctx) => {
        const rows = hooks.sampleRows();
        await seed(ctx, dataset, rows);
        dataset.input = [rows[0]];
        await attempt(ctx, () => invoke(dataset, method));
        const before = await readState(dataset);

        dataset.input = [rows[1], rows[1]];
        await expect(invoke(dataset, method)).rejects.toBeInstanceOf(datasetErrorFor(method));

        expectFailed(dataset, method);
        expect(await readState(dataset)).toEqual(before);
      });
    }

    // ── Idempotence ──────────────────────────────────────────────

    for (const method of IDENTITY_METHODS) {
      it(`${method} is idempotent`, async (ctx) => {
        const rows = hooks.sampleRows();
        await seed(ctx, dataset, rows);

        dataset.input = structuredClone(rows);
        await attempt(ctx, () => invoke(dataset, method));
        const once = await readState(dataset);

        dataset.input = structuredClone(rows);
        await invoke(dataset, method);
        expect(dataset.operation?.success).toBe(true);
        expect(await readState(dataset)).toEqual(once);
      });
    }

    it('purge is idempotent and leaves output empty', async (ctx) => {
      await seed(ctx, dataset, hooks.sampleRows());

      expect(await attempt(ctx, () => dataset.purge())).toBeUndefined();
      expect(dataset.output).toEqual([]);
      expect(await readState(dataset)).toEqual([]);

      await dataset.purge();
      expect(dataset.operation?.success).toBe(true);
      expect(dataset.output).toEqual([]);
      expect(await readState(dataset)).toEqual([]);
    });

    // ── Read ─────────────────────────────────────────────────────

    it('read with an empty checkpoint is a full load', async (ctx) => {
      const before = await readState(dataset);
      const rows = hooks.sampleRows();
      await seed(ctx, dataset, rows);

      dataset.checkpoint = {};
      expect(await dataset.read()).toBeUndefined();
      expect(dataset.output).toHaveLength(before.length + rows.length);
    });

    it('read ignores a checkpoint when checkpointing is unsupported', async (ctx) => {
      if (dataset.capabilities.supportsCheckpoint) {
        ctx.skip();
        return;
      }
      const rows = hooks.sampleRows();
      await seed(ctx, dataset, rows);
      const full = await readState(dataset);

      const checkpoint = { position: 'far-ahead', value: Number.MAX_SAFE_INTEGER };
      dataset.checkpoint = structuredClone(checkpoint);
      await dataset.read();

      expect(fingerprint(dataset.output)).toEqual(full);
      expect(dataset.checkpoint).toEqual(checkpoint);
    });

    // ── Capacity ─────────────────────────────────────────────────

    it('rejects inputs above the declared batch limit without writing', async (ctx) => {
      const limit = dataset.capabilities.maxBatchSize;
      if (limit === undefined) {
        ctx.skip();
        return;
      }
      const before = await readState(dataset);

      dataset.input = hooks.sampleRows(limit + 1);
      await expect(dataset.create()).rejects.toBeInstanceOf(datasetErrorFor('create'));
      expectFailed(dataset, 'create');
      expect(await readState(dataset)).toEqual(before);

      dataset.input = hooks.sampleRows(limit);
      await attempt(ctx, () => dataset.create());
      expect(dataset.output).toHaveLength(limit);
    });

    // ── Rename, list, close ──────────────────────────────────────

    it('rename succeeds once and fails when repeated', async (ctx) => {
      const target = hooks.renameTarget?.(dataset) ?? `renamed_${generateId().slice(0, 8)}`;

      expect(await attempt(ctx, () => dataset.rename(target))).toBeUndefined();
      expect(dataset.operation?.success).toBe(true);
      expect(dataset.output).toEqual([]);

      await expect(dataset.rename(target)).rejects.toBeInstanceOf(datasetErrorFor('rename'));
      expectFailed(dataset, 'rename');
    });

    it('list populates output', async (ctx) => {
      expect(await attempt(ctx, () => dataset.list())).toBeUndefined();

      expect(dataset.output.length).toBeGreaterThan(0);
      expect(dataset.operation?.success).toBe(true);
      expect(dataset.operation?.rowCount).toBe(dataset.output.length);
    });

    it('close is idempotent and leaves the last operation untouched', async () => {
      await dataset.read();
      const last = dataset.operation;

      await dataset.close();
      await dataset.close();

      expect(dataset.operation).toBe(last);
    });
  });
}
