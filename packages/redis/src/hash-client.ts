import { createClient, WatchError } from 'redis';
import type { Logger } from '@datalink/core';

/** Field changes applied to one hash in a single MULTI. */
export interface HashWrite {
  readonly set?: Readonly<Record<string, string>>;
  readonly del?: readonly string[];
}

/**
 * The Redis commands the hash provider issues. Tests substitute an in-process map.
 */
export interface HashClient {
  connect(): Promise<void>;
  ping(): Promise<string>;
  hGetAll(key: string): Promise<Record<string, string>>;
  hLen(key: string): Promise<number>;
  /**
   * WATCH `key`, read `fields`, apply what `plan` returns in one MULTI.
   * Resolves false when another client touched `key` in between. A throwing
   * plan writes nothing.
   */
  atomicUpdate(key: string, fields: readonly string[], plan: (current: Array<string | null>) => HashWrite): Promise<boolean>;
  del(key: string): Promise<number>;
  /** RENAMENX: false when `newKey` already exists. */
  renameNx(key: string, newKey: string): Promise<boolean>;
  /** Every key matching `pattern`. */
  scan(pattern: string): Promise<string[]>;
  quit(): Promise<void>;
  disconnect(): Promise<void>;
}

/** Connection options. Use a rediss:// url for TLS. */
export interface RedisConnectionSettings {
  url?: string;
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  database?: number;
  connectTimeout?: number;
}

type RedisClient = ReturnType<typeof createClient>;

function text(value: string | Buffer): string {
  return typeof value === 'string' ? value : value.toString('utf8');
}

/**
 * HashClient over a node-redis v4 client.
 */
export class RedisHashClient implements HashClient {
  constructor(private readonly client: RedisClient) {}

  static fromSettings(settings: RedisConnectionSettings, logger: Logger): RedisHashClient {
    const client = createClient({
      url: settings.url,
      username: settings.username,
      password: settings.password,
      database: settings.database,
      socket: {
        host: settings.host,
        port: settings.port,
        connectTimeout: settings.connectTimeout ?? 10_000,
        reconnectStrategy: false,
      },
    });
    client.on('error', (err: unknown) => logger.warn({ err }, 'redis client error'));
    return new RedisHashClient(client);
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  ping(): Promise<string> {
    return this.client.ping();
  }

  async hGetAll(key: string): Promise<Record<string, string>> {
    const reply = await this.client.hGetAll(key);
    const hash: Record<string, string> = {};
    for (const [field, value] of Object.entries(reply)) {
      hash[field] = text(value);
    }
    return hash;
  }

  hLen(key: string): Promise<number> {
    return this.client.hLen(key);
  }

  atomicUpdate(key: string, fields: readonly string[], plan: (current: Array<string | null>) => HashWrite): Promise<boolean> {
    return this.client.executeIsolated(async isolated => {
      await isolated.watch(key);
      const reply: Array<string | Buffer | null> = fields.length > 0 ? await isolated.hmGet(key, [...fields]) : [];
      const current = reply.map(value => (value === null ? null : text(value)));

      let write: HashWrite;
      try {
        write = plan(current);
      } catch (err) {
        await isolated.unwatch();
        throw err;
      }

      const multi = isolated.multi();
      if (write.set && Object.keys(write.set).length > 0) multi.hSet(key, { ...write.set });
      if (write.del && write.del.length > 0) multi.hDel(key, [...write.del]);
      try {
        await multi.exec();
        return true;
      } catch (err) {
        if (err instanceof WatchError) return false;
        throw err;
      }
    });
  }

  del(key: string): Promise<number> {
    return this.client.del(key);
  }

  renameNx(key: string, newKey: string): Promise<boolean> {
    return this.client.renameNX(key, newKey);
  }

  async scan(pattern: string): Promise<string[]> {
    const keys: string[] = [];
    let cursor = 0;
    do {
      const reply = await this.client.scan(cursor, { MATCH: pattern, COUNT: 100 });
      keys.push(...reply.keys);
      cursor = reply.cursor;
    } while (cursor !== 0);
    return keys;
  }

  async quit(): Promise<void> {
    await this.client.quit();
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
  }
}
