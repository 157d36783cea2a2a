// Types
export type { Row, Checkpoint, LinkedServiceSettings, DatasetSettings, ResourceOptions, ResourceInfo } from './types/resource';
export { isEmptyCheckpoint, formatResourceInfo, resourceKey } from './types/resource';
export type { DatasetMethod, InputMethod, OperationInfo, OperationError, SerializedOperationInfo } from './types/operation';
export {
  DATASET_METHODS,
  INPUT_METHODS,
  createOperationInfo,
  serializeOperationInfo,
} from './types/operation';
export {
  ResourceError,
  NotSupportedError,
  ValidationError,
  DeserializationError,
  LinkedServiceError,
  ConnectionError,
  AuthenticationError,
  AuthorizationError,
  LinkedServiceNotSupportedError,
  DatasetError,
  ReadError,
  CreateError,
  UpdateError,
  UpsertError,
  DeleteError,
  PurgeError,
  ListError,
  RenameError,
  DatasetNotSupportedError,
  MismatchedLinkedServiceError,
  datasetErrorFor,
  isResourceError,
} from './types/errors';
export type { ResourceErrorOptions, DatasetErrorConstructor } from './types/errors';

// Interfaces
export type { LinkedService, ConnectionStatus } from './interfaces/linked-service';
export type { Dataset, DatasetCapabilities } from './interfaces/dataset';
export type { ResourceEventBus } from './interfaces/event-bus';

// Base classes
export { BaseLinkedService, withLinkedService, type LinkedServiceOptions } from './resource/linked-service';
export {
  BaseDataset,
  type DatasetOptions,
  type ReadRequest,
  type ReadResult,
  type WriteResult,
} from './resource/dataset';
export { instrument, toOperationError, type TrackedOutcome, type InstrumentOptions } from './resource/instrument';

// Implementations
export {
  EventDispatcher,
  type EventType,
  type DispatchedEvent,
  type EventListener,
  type EventDispatcherOptions,
} from './impl/event-dispatcher';
export {
  ResourceRegistry,
  defineLinkedService,
  defineDataset,
  compareVersions,
  type ResourceConfig,
  type RegistryResourceOptions,
  type LinkedServiceDescriptor,
  type DatasetDescriptor,
  type LinkedServiceEntry,
  type DatasetEntry,
  type BuildContext,
  type ProviderManifest,
  type ProviderSummary,
  type ResourceRegistryOptions,
} from './impl/resource-registry';
export {
  MemoryBackend,
  MemoryBackendError,
  type MemoryBackendOptions,
  type MemoryBackendOperation,
  type PageRequest,
  type TableSummary,
} from './impl/memory-backend';
export {
  MemoryLinkedService,
  MEMORY_LINKED_SERVICE_KIND,
  type MemoryLinkedServiceSettings,
  type MemoryLinkedServiceOptions,
  type MemoryConnection,
} from './impl/memory-linked-service';
export {
  MemoryDataset,
  MEMORY_DATASET_KIND,
  isMemoryCheckpoint,
  type MemoryDatasetSettings,
  type MemoryDatasetOptions,
  type MemoryCheckpoint,
} from './impl/memory-dataset';
export { memoryProvider } from './impl/memory-provider';

// Utils
export { generateId, now, cloneRows, identityKey, findDuplicateIdentity, missingIdentityColumns, inferSchema, inferValueType } from './utils';
export type { ValueType } from './utils';
export { createLogger, getLogger, type Logger } from './utils/logger';
export { resolveConfig, type DatalinkConfig, type LogLevel } from './utils/config';
