export {
  RedisHashClient,
  type HashClient,
  type HashWrite,
  type RedisConnectionSettings,
} from './hash-client';
export {
  RedisLinkedService,
  REDIS_LINKED_SERVICE_KIND,
  type RedisLinkedServiceSettings,
  type RedisLinkedServiceOptions,
  type RedisClientFactory,
} from './redis-linked-service';
export {
  RedisHashDataset,
  REDIS_HASH_DATASET_KIND,
  type RedisHashDatasetSettings,
  type RedisHashDatasetOptions,
} from './redis-hash-dataset';
export { redisProvider, type RedisProviderOptions } from './redis-provider';
