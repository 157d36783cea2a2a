import { MismatchedLinkedServiceError } from '../types/errors';
import { defineDataset, defineLinkedService, type ProviderManifest } from './resource-registry';
import type { MemoryBackend } from './memory-backend';
import { MEMORY_LINKED_SERVICE_KIND, MemoryLinkedService, type MemoryLinkedServiceSettings } from './memory-linked-service';
import { MEMORY_DATASET_KIND, MemoryDataset, type MemoryDatasetSettings } from './memory-dataset';

/**
 * Registry manifest for the in-memory provider. Every linked service it builds binds to `backend`.
 */
export function memoryProvider(backend: MemoryBackend): ProviderManifest {
  return {
    name: 'memory',
    description: 'In-process tables for tests and local runs',
    linkedServices: [
      defineLinkedService<MemoryLinkedServiceSettings>({
        info: { kind: MEMORY_LINKED_SERVICE_KIND, name: 'MemoryLinkedService', version: '1.0.0' },
        settingsSchema: {
          type: 'object',
          properties: { accessToken: { type: 'string' } },
          additionalProperties: false,
        },
        create: options => new MemoryLinkedService({ ...options, backend }),
      }),
    ],
    datasets: [
      defineDataset<MemoryDatasetSettings>({
        info: { kind: MEMORY_DATASET_KIND, name: 'MemoryDataset', version: '1.0.0' },
        linkedServiceKind: MEMORY_LINKED_SERVICE_KIND,
        settingsSchema: {
          type: 'object',
          required: ['table'],
          properties: {
            table: { type: 'string', minLength: 1 },
            identityColumns: { type: 'array', items: { type: 'string', minLength: 1 }, uniqueItems: true },
            checkpointColumn: { type: 'string', minLength: 1 },
            since: { type: ['string', 'number'] },
            pageSize: { type: 'integer', minimum: 1 },
            maxBatchSize: { type: 'integer', minimum: 1 },
            strictUpdate: { type: 'boolean' },
          },
          additionalProperties: false,
        },
        create: (options, linkedService) => {
          if (!(linkedService instanceof MemoryLinkedService)) {
            throw new MismatchedLinkedServiceError({
              message: `${MEMORY_DATASET_KIND} requires a MemoryLinkedService`,
              details: { expected: MEMORY_LINKED_SERVICE_KIND, actual: linkedService.kind },
            });
          }
          return new MemoryDataset({ ...options, linkedService });
        },
      }),
    ],
  };
}
