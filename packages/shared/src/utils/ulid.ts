import { monotonicFactory } from 'ulid';

const CROCKFORD_BASE32 = /^[0123456789ABCDEFGHJKMNPQRSTVWXYZ]{26}$/;

const ulid = monotonicFactory();

/**
 * Monotonic ULID. Passing `at` seeds the timestamp part from an injected
 * clock. Ids follow `occurredAt` while that clock moves forward; when it goes
 * back, the factory keeps the last timestamp and bumps the random part, so
 * ids still increase but no longer encode `at`.
 */
export function generateUlid(at?: Date): string {
  return at ? ulid(at.getTime()) : ulid();
}

export function isValidUlid(value: string): boolean {
  if (typeof value !== 'string' || value.length !== 26) {
    return false;
  }
  return CROCKFORD_BASE32.test(value);
}
