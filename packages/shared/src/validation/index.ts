import type { z } from 'zod';
import { ValidationError } from '../errors';

/**
 * Assert that a Zod safeParse result succeeded, throwing a ValidationError if not.
 * After calling this, `parsed.data` is type-safe.
 *
 * @example
 * ```ts
 * const parsed = OutboxEnvelopeSchema.safeParse(row);
 * assertValidated(parsed, 'Outbox row is malformed');
 * // parsed.data is now an OutboxEnvelope
 * ```
 */
export function assertValidated<T>(
  parsed: z.SafeParseReturnType<unknown, T>,
  message = 'Validation failed',
): asserts parsed is z.SafeParseSuccess<T> {
  if (!parsed.success) {
    throw new ValidationError(
      message,
      parsed.error.issues.map((i) => ({
        field: i.path.join('.'),
        message: i.message,
      })),
    );
  }
}
