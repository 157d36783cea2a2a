import { vi } from 'vitest';
import type { HashClient, HashWrite } from '../hash-client';

/**
 * In-process stand-in for Redis hashes. Empty hashes disappear, as they do on a server.
 */
export class FakeHashClient implements HashClient {
  readonly hashes = new Map<string, Map<string, string>>();
  /** Every command rejects with this while set */
  failure: Error | undefined;
  /** Number of upcoming atomicUpdate calls that lose their WATCH */
  contention = 0;

  connect = vi.fn(async () => this.guard());

  ping = vi.fn(async () => {
    this.guard();
    return 'PONG';
  });

  quit = vi.fn(async () => {});

  disconnect = vi.fn(async () => {});

  /** Seed a hash with JSON rows keyed by field. */
  seed(key: string, rows: Record<string, unknown>): void {
    const hash = new Map<string, string>();
    for (const [field, row] of Object.entries(rows)) {
      hash.set(field, typeof row === 'string' ? row : JSON.stringify(row));
    }
    this.hashes.set(key, hash);
  }

  async hGetAll(key: string): Promise<Record<string, string>> {
    this.guard();
    return Object.fromEntries(this.hashes.get(key) ?? []);
  }

  async hLen(key: string): Promise<number> {
    this.guard();
    return this.hashes.get(key)?.size ?? 0;
  }

  async atomicUpdate(key: string, fields: readonly string[], plan: (current: Array<string | null>) => HashWrite): Promise<boolean> {
    this.guard();
    const hash = this.hashes.get(key) ?? new Map<string, string>();
    const write = plan(fields.map(field => hash.get(field) ?? null));
    if (this.contention > 0) {
      this.contention--;
      return false;
    }
    for (const [field, value] of Object.entries(write.set ?? {})) {
      hash.set(field, value);
    }
    for (const field of write.del ?? []) {
      hash.delete(field);
    }
    if (hash.size > 0) {
      this.hashes.set(key, hash);
    } else {
      this.hashes.delete(key);
    }
    return true;
  }

  async del(key: string): Promise<number> {
    this.guard();
    return this.hashes.delete(key) ? 1 : 0;
  }

  async renameNx(key: string, newKey: string): Promise<boolean> {
    this.guard();
    const hash = this.hashes.get(key);
    if (!hash) throw new Error('ERR no such key');
    if (this.hashes.has(newKey)) return false;
    this.hashes.delete(key);
    this.hashes.set(newKey, hash);
    return true;
  }

  /** Supports a single trailing `*`. */
  async scan(pattern: string): Promise<string[]> {
    this.guard();
    const prefix = pattern.endsWith('*') ? pattern.slice(0, -1) : pattern;
    return [...this.hashes.keys()].filter(key => (pattern.endsWith('*') ? key.startsWith(prefix) : key === pattern));
  }

  private guard(): void {
    if (this.failure) throw this.failure;
  }
}
