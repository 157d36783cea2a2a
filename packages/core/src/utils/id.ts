import { randomUUID } from 'node:crypto';

/** Resource ids are UUIDs so configurations can carry them. */
export function generateId(): string {
  return randomUUID();
}

export function now(): number {
  return Date.now();
}
