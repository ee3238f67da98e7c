import type { z } from 'zod';
import {
  DEFAULT_MESSAGE_FORMAT,
  UnregisteredMessageTypeError,
  ValidationError,
} from '@txbox/shared';

/**
 * Anything the application wants to publish. `type` is the stable tag the
 * registry is keyed by; it is never derived from the runtime class.
 */
export interface DomainEvent {
  readonly type: string;
}

export interface MessageRegistration<E extends DomainEvent = DomainEvent> {
  /** Tag carried in `event.type`. */
  eventType: E['type'];
  topic: string;
  /** Logical message type written to the envelope, e.g. `student_enrolled`. */
  messageType: string;
  /** Partition/routing key, usually the aggregate id. */
  key(event: E): string;
  format?: string;
  serialize?(event: E): string;
  /** Validated before the envelope is built. */
  schema?: z.ZodType<unknown>;
}

export interface ResolvedRegistration {
  eventType: string;
  topic: string;
  messageType: string;
  format: string;
  key(event: DomainEvent): string;
  serialize(event: DomainEvent): string;
  schema?: z.ZodType<unknown>;
}

export interface MessageRegistry {
  resolve(eventType: string): ResolvedRegistration;
  has(eventType: string): boolean;
  eventTypes(): string[];
  topics(): string[];
}

function defaultSerialize(event: DomainEvent): string {
  return JSON.stringify(event);
}

class StaticMessageRegistry implements MessageRegistry {
  constructor(private readonly table: ReadonlyMap<string, ResolvedRegistration>) {}

  resolve(eventType: string): ResolvedRegistration {
    const registration = this.table.get(eventType);
    if (!registration) {
      throw new UnregisteredMessageTypeError(eventType);
    }
    return registration;
  }

  has(eventType: string): boolean {
    return this.table.has(eventType);
  }

  eventTypes(): string[] {
    return [...this.table.keys()];
  }

  topics(): string[] {
    return [...new Set([...this.table.values()].map((r) => r.topic))];
  }
}

/**
 * Typed helper so each registration checks `key`/`serialize` against its
 * own event type before being widened into the registry table.
 */
export function registerMessage<E extends DomainEvent>(
  registration: MessageRegistration<E>,
): MessageRegistration<E> {
  return registration;
}

/**
 * Build the immutable event-type → (topic, key, type) table. Call once at
 * startup; the returned registry is read-only.
 */
export function defineMessageRegistry(
  registrations: ReadonlyArray<MessageRegistration>,
): MessageRegistry {
  const table = new Map<string, ResolvedRegistration>();
  const errors: Array<{ field: string; message: string }> = [];

  registrations.forEach((reg, index) => {
    if (!reg.eventType) {
      errors.push({ field: `${index}.eventType`, message: 'eventType is required' });
      return;
    }
    if (!reg.topic) {
      errors.push({ field: `${index}.topic`, message: `topic is required for ${reg.eventType}` });
      return;
    }
    if (!reg.messageType) {
      errors.push({ field: `${index}.messageType`, message: `messageType is required for ${reg.eventType}` });
      return;
    }
    if (table.has(reg.eventType)) {
      errors.push({
        field: `${index}.eventType`,
        message: `${reg.eventType} is registered more than once`,
      });
      return;
    }
    table.set(
      reg.eventType,
      Object.freeze({
        eventType: reg.eventType,
        topic: reg.topic,
        messageType: reg.messageType,
        format: reg.format ?? DEFAULT_MESSAGE_FORMAT,
        key: (event: DomainEvent) => reg.key(event),
        serialize: (event: DomainEvent) =>
          reg.serialize ? reg.serialize(event) : defaultSerialize(event),
        schema: reg.schema,
      }),
    );
  });

  if (errors.length > 0) {
    throw new ValidationError('Invalid message registry', errors);
  }

  return new StaticMessageRegistry(table);
}
