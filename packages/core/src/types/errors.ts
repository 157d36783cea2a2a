import type { DatasetMethod } from './operation';

/**
 * Constructor arguments shared by every resource error.
 * All fields are optional; each subclass supplies its own defaults.
 */
export interface ResourceErrorOptions {
  readonly message?: string;
  readonly code?: string;
  readonly statusCode?: number;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

/**
 * Base error for all contract failures.
 * `code` is the discriminant; callers may catch this class to handle every kind uniformly.
 */
export class ResourceError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details: Record<string, unknown>;

  constructor(options: ResourceErrorOptions = {}) {
    super(options.message ?? 'Resource operation failed', options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ResourceError';
    this.code = options.code ?? 'DS_RESOURCE_ERROR';
    this.statusCode = options.statusCode ?? 500;
    this.details = { ...(options.details ?? {}) };
  }
}

/**
 * A provider does not implement an optional operation.
 */
export class NotSupportedError extends ResourceError {
  constructor(options: ResourceErrorOptions = {}) {
    super({
      message: 'Operation not supported',
      code: 'DS_RESOURCE_NOT_SUPPORTED_ERROR',
      statusCode: 501,
      ...options,
    });
    this.name = 'NotSupportedError';
  }
}

/**
 * Input failed validation before reaching the backend.
 */
export class ValidationError extends ResourceError {
  constructor(options: ResourceErrorOptions = {}) {
    super({
      message: 'Validation failed',
      code: 'DS_RESOURCE_VALIDATION_ERROR',
      statusCode: 400,
      ...options,
    });
    this.name = 'ValidationError';
  }
}

/**
 * A resource configuration could not be turned into an instance.
 */
export class DeserializationError extends ResourceError {
  constructor(options: ResourceErrorOptions = {}) {
    super({
      message: 'Deserialization failed',
      code: 'DS_RESOURCE_DESERIALIZATION_ERROR',
      statusCode: 400,
      ...options,
    });
    this.name = 'DeserializationError';
  }
}

// === Linked Service Errors ===

export class LinkedServiceError extends ResourceError {
  constructor(options: ResourceErrorOptions = {}) {
    super({
      message: 'Linked service operation failed',
      code: 'DS_LINKED_SERVICE_ERROR',
      statusCode: 500,
      ...options,
    });
    this.name = 'LinkedServiceError';
  }
}

/**
 * Backend unreachable, or the connection handle was requested before connect().
 */
export class ConnectionError extends LinkedServiceError {
  constructor(options: ResourceErrorOptions = {}) {
    super({
      message: 'Connection failed',
      code: 'DS_LINKED_SERVICE_CONNECTION_ERROR',
      statusCode: 503,
      ...options,
    });
    this.name = 'ConnectionError';
  }
}

/**
 * Credentials were rejected.
 */
export class AuthenticationError extends LinkedServiceError {
  constructor(options: ResourceErrorOptions = {}) {
    super({
      message: 'Authentication failed',
      code: 'DS_LINKED_SERVICE_AUTHENTICATION_ERROR',
      statusCode: 401,
      ...options,
    });
    this.name = 'AuthenticationError';
  }
}

/**
 * Credentials were accepted but lack the required permission.
 */
export class AuthorizationError extends LinkedServiceError {
  constructor(options: ResourceErrorOptions = {}) {
    super({
      message: 'Authorization failed',
      code: 'DS_LINKED_SERVICE_AUTHORIZATION_ERROR',
      statusCode: 403,
      ...options,
    });
    this.name = 'AuthorizationError';
  }
}

export class LinkedServiceNotSupportedError extends NotSupportedError {
  constructor(options: ResourceErrorOptions = {}) {
    super({
      message: 'Linked service operation not supported',
      code: 'DS_LINKED_SERVICE_NOT_SUPPORTED_ERROR',
      ...options,
    });
    this.name = 'LinkedServiceNotSupportedError';
  }
}

// === Dataset Errors ===

export class DatasetError extends ResourceError {
  constructor(options: ResourceErrorOptions = {}) {
    super({
      message: 'Dataset operation failed',
      code: 'DS_DATASET_ERROR',
      statusCode: 500,
      ...options,
    });
    this.name = 'DatasetError';
  }
}

export class ReadError extends DatasetError {
  constructor(options: ResourceErrorOptions = {}) {
    super({ message: 'Read operation failed', code: 'DS_DATASET_READ_ERROR', ...options });
    this.name = 'ReadError';
  }
}

export class CreateError extends DatasetError {
  constructor(options: ResourceErrorOptions = {}) {
    super({ message: 'Create operation failed', code: 'DS_DATASET_CREATE_ERROR', ...options });
    this.name = 'CreateError';
  }
}

export class UpdateError extends DatasetError {
  constructor(options: ResourceErrorOptions = {}) {
    super({ message: 'Update operation failed', code: 'DS_DATASET_UPDATE_ERROR', ...options });
    this.name = 'UpdateError';
  }
}

export class UpsertError extends DatasetError {
  constructor(options: ResourceErrorOptions = {}) {
    super({ message: 'Upsert operation failed', code: 'DS_DATASET_UPSERT_ERROR', ...options });
    this.name = 'UpsertError';
  }
}

export class DeleteError extends DatasetError {
  constructor(options: ResourceErrorOptions = {}) {
    super({ message: 'Delete operation failed', code: 'DS_DATASET_DELETE_ERROR', ...options });
    this.name = 'DeleteError';
  }
}

export class PurgeError extends DatasetError {
  constructor(options: ResourceErrorOptions = {}) {
    super({ message: 'Purge operation failed', code: 'DS_DATASET_PURGE_ERROR', ...options });
    this.name = 'PurgeError';
  }
}

export class ListError extends DatasetError {
  constructor(options: ResourceErrorOptions = {}) {
    super({ message: 'List operation failed', code: 'DS_DATASET_LIST_ERROR', ...options });
    this.name = 'ListError';
  }
}

export class RenameError extends DatasetError {
  constructor(options: ResourceErrorOptions = {}) {
    super({ message: 'Rename operation failed', code: 'DS_DATASET_RENAME_ERROR', ...options });
    this.name = 'RenameError';
  }
}

export class DatasetNotSupportedError extends NotSupportedError {
  constructor(options: ResourceErrorOptions = {}) {
    super({
      message: 'Dataset operation not supported',
      code: 'DS_DATASET_NOT_SUPPORTED_ERROR',
      ...options,
    });
    this.name = 'DatasetNotSupportedError';
  }
}

/**
 * A dataset was bound to a linked service of the wrong kind.
 */
export class MismatchedLinkedServiceError extends DatasetError {
  constructor(options: ResourceErrorOptions = {}) {
    super({
      message: 'Mismatched linked service',
      code: 'DS_DATASET_LINKED_SERVICE_MISMATCHED_ERROR',
      statusCode: 400,
      ...options,
    });
    this.name = 'MismatchedLinkedServiceError';
  }
}

export type DatasetErrorConstructor = new (options?: ResourceErrorOptions) => DatasetError;

const DATASET_ERRORS: Readonly<Record<DatasetMethod, DatasetErrorConstructor>> = {
  read: ReadError,
  create: CreateError,
  update: UpdateError,
  upsert: UpsertError,
  delete: DeleteError,
  purge: PurgeError,
  list: ListError,
  rename: RenameError,
};

/** Failure kind documented for a dataset method. */
export function datasetErrorFor(method: DatasetMethod): DatasetErrorConstructor {
  return DATASET_ERRORS[method];
}

export function isResourceError(value: unknown): value is ResourceError {
  return value instanceof ResourceError;
}
