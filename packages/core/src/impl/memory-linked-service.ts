import { BaseLinkedService, type LinkedServiceOptions } from '../resource/linked-service';
import { AuthenticationError, ConnectionError } from '../types/errors';
import { MemoryBackendError, type MemoryBackend } from './memory-backend';

export const MEMORY_LINKED_SERVICE_KIND = 'DS.RESOURCE.LINKED_SERVICE.MEMORY';

export interface MemoryLinkedServiceSettings extends Record<string, unknown> {
  accessToken?: string;
}

export interface MemoryConnection {
  readonly backend: MemoryBackend;
  readonly openedAt: number;
}

export interface MemoryLinkedServiceOptions extends LinkedServiceOptions<MemoryLinkedServiceSettings> {
  readonly backend: MemoryBackend;
}

/**
 * Linked service bound to one MemoryBackend.
 */
export class MemoryLinkedService extends BaseLinkedService<MemoryLinkedServiceSettings, MemoryConnection> {
  readonly kind = MEMORY_LINKED_SERVICE_KIND;
  private readonly backend: MemoryBackend;

  constructor(options: MemoryLinkedServiceOptions) {
    super(options);
    this.backend = options.backend;
  }

  protected async open(): Promise<MemoryConnection> {
    let accepted: boolean;
    try {
      accepted = this.backend.authenticate(this.settings.accessToken);
    } catch (err) {
      throw this.unreachable(err);
    }
    if (!accepted) {
      throw new AuthenticationError({
        message: 'Memory backend rejected the access token',
        details: { resourceId: this.id, kind: this.kind },
      });
    }
    return { backend: this.backend, openedAt: Date.now() };
  }

  protected async release(_handle: MemoryConnection): Promise<void> {}

  protected async ping(handle: MemoryConnection): Promise<string> {
    try {
      const tables = handle.backend.ping();
      return `Memory backend reachable (${tables} tables)`;
    } catch (err) {
      throw this.unreachable(err);
    }
  }

  private unreachable(err: unknown): ConnectionError {
    return new ConnectionError({
      message: err instanceof Error ? err.message : String(err),
      details: {
        resourceId: this.id,
        kind: this.kind,
        ...(err instanceof MemoryBackendError ? { backendCode: err.code } : {}),
      },
      cause: err,
    });
  }
}
