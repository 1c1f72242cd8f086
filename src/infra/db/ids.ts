import { randomUUID } from 'crypto';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/**
 * User ids are generated here, not by the engine, so both adapters hand out
 * the same lowercase UUID form.
 */
export function newUserId(): string {
  return randomUUID();
}

export function isUserId(value: string): boolean {
  return UUID_PATTERN.test(value);
}
