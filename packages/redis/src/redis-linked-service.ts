import {
  AuthenticationError,
  AuthorizationError,
  BaseLinkedService,
  ConnectionError,
  type LinkedServiceError,
  type LinkedServiceOptions,
  type Logger,
} from '@datalink/core';
import { RedisHashClient, type HashClient, type RedisConnectionSettings } from './hash-client';

export const REDIS_LINKED_SERVICE_KIND = 'DS.RESOURCE.LINKED_SERVICE.REDIS';

export interface RedisLinkedServiceSettings extends RedisConnectionSettings, Record<string, unknown> {}

export type RedisClientFactory = (settings: RedisLinkedServiceSettings, logger: Logger) => HashClient;

export interface RedisLinkedServiceOptions extends LinkedServiceOptions<RedisLinkedServiceSettings> {
  readonly clientFactory?: RedisClientFactory;
}

/**
 * Linked service over one Redis connection.
 *
 * Server replies are mapped by their error prefix: WRONGPASS / NOAUTH are
 * rejected credentials, NOPERM an ACL denial.
 */
export class RedisLinkedService extends BaseLinkedService<RedisLinkedServiceSettings, HashClient> {
  readonly kind = REDIS_LINKED_SERVICE_KIND;
  private readonly clientFactory: RedisClientFactory;

  constructor(options: RedisLinkedServiceOptions) {
    super(options);
    this.clientFactory = options.clientFactory ?? RedisHashClient.fromSettings;
  }

  protected async open(): Promise<HashClient> {
    const client = this.clientFactory(this.settings, this.log);
    try {
      await client.connect();
      await client.ping();
      return client;
    } catch (err) {
      await client.disconnect().catch((closeErr: unknown) => {
        this.log.debug({ err: closeErr }, 'disconnect after a failed connect');
      });
      throw this.classify(err);
    }
  }

  protected async release(client: HashClient): Promise<void> {
    await client.quit();
  }

  protected async ping(client: HashClient): Promise<string> {
    try {
      const reply = await client.ping();
      return `Redis replied ${reply}`;
    } catch (err) {
      throw this.classify(err);
    }
  }

  classify(err: unknown): LinkedServiceError {
    const message = err instanceof Error ? err.message : String(err);
    const options = { message, details: { resourceId: this.id, kind: this.kind }, cause: err };
    if (/^(WRONGPASS|NOAUTH)\b/.test(message)) return new AuthenticationError(options);
    if (/^NOPERM\b/.test(message)) return new AuthorizationError(options);
    return new ConnectionError(options);
  }
}
