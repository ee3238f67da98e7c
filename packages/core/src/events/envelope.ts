import { generateUlid, assertValidated, ValidationError } from '@txbox/shared';
import type { OutboxEnvelope } from '@txbox/shared';
import type { DomainEvent, ResolvedRegistration } from './registry';

interface BuildEnvelopeInput {
  event: DomainEvent;
  registration: ResolvedRegistration;
  correlationId: string;
  occurredAt: Date;
}

export function buildEnvelope(input: BuildEnvelopeInput): OutboxEnvelope {
  const { event, registration } = input;

  if (registration.schema) {
    const parsed = registration.schema.safeParse(event);
    assertValidated(parsed, `Event ${registration.eventType} failed validation`);
  }

  const key = registration.key(event);
  if (!key) {
    throw new ValidationError(`Event ${registration.eventType} produced an empty message key`, [
      { field: 'key', message: 'must not be empty' },
    ]);
  }

  return {
    id: generateUlid(input.occurredAt),
    correlationId: input.correlationId,
    topic: registration.topic,
    key,
    type: registration.messageType,
    format: registration.format,
    data: registration.serialize(event),
    occurredAt: input.occurredAt,
    processedAt: null,
  };
}
