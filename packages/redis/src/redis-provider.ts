import { MismatchedLinkedServiceError, defineDataset, defineLinkedService, type ProviderManifest } from '@datalink/core';
import { REDIS_LINKED_SERVICE_KIND, RedisLinkedService, type RedisClientFactory, type RedisLinkedServiceSettings } from './redis-linked-service';
import { REDIS_HASH_DATASET_KIND, RedisHashDataset, type RedisHashDatasetSettings } from './redis-hash-dataset';

export interface RedisProviderOptions {
  readonly clientFactory?: RedisClientFactory;
}

export function redisProvider(options: RedisProviderOptions = {}): ProviderManifest {
  return {
    name: 'redis',
    description: 'Rows stored as JSON fields of a Redis hash',
    linkedServices: [
      defineLinkedService<RedisLinkedServiceSettings>({
        info: { kind: REDIS_LINKED_SERVICE_KIND, name: 'RedisLinkedService', version: '1.0.0' },
        settingsSchema: {
          type: 'object',
          properties: {
            url: { type: 'string', pattern: '^rediss?://' },
            host: { type: 'string' },
            port: { type: 'integer', minimum: 1, maximum: 65535 },
            username: { type: 'string' },
            password: { type: 'string' },
            database: { type: 'integer', minimum: 0 },
            connectTimeout: { type: 'integer', minimum: 0 },
          },
          additionalProperties: false,
        },
        create: resource => new RedisLinkedService({ ...resource, clientFactory: options.clientFactory }),
      }),
    ],
    datasets: [
      defineDataset<RedisHashDatasetSettings>({
        info: { kind: REDIS_HASH_DATASET_KIND, name: 'RedisHashDataset', version: '1.0.0' },
        linkedServiceKind: REDIS_LINKED_SERVICE_KIND,
        settingsSchema: {
          type: 'object',
          required: ['hash', 'identityColumns'],
          properties: {
            hash: { type: 'string', minLength: 1 },
            keyPrefix: { type: 'string' },
            identityColumns: { type: 'array', items: { type: 'string', minLength: 1 }, minItems: 1, uniqueItems: true },
            maxBatchSize: { type: 'integer', minimum: 1 },
            strictUpdate: { type: 'boolean' },
          },
          additionalProperties: false,
        },
        create: (resource, linkedService) => {
          if (!(linkedService instanceof RedisLinkedService)) {
            throw new MismatchedLinkedServiceError({
              message: `${REDIS_HASH_DATASET_KIND} requires a RedisLinkedService`,
              details: { expected: REDIS_LINKED_SERVICE_KIND, actual: linkedService.kind },
            });
          }
          return new RedisHashDataset({ ...resource, linkedService });
        },
      }),
    ],
  };
}
