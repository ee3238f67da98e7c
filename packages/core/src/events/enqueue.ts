import { generateUlid } from '@txbox/shared';
import type { OutboxEnvelope } from '@txbox/shared';
import { systemClock } from './clock';
import type { Clock } from './clock';
import type { WakeTarget } from './dispatcher';
import { buildEnvelope } from './envelope';
import { Notifier } from './notifier';
import type { DomainEvent, MessageRegistry } from './registry';
import type { UnitOfWork } from './unit-of-work';

export interface EnqueueOptions {
  registry: MessageRegistry;
  /** Woken by `Notifier#notify`. Without one, notify always skips. */
  dispatcher?: WakeTarget | null;
  clock?: Clock;
  /** Shared by every envelope of the call. Defaults to a fresh ULID. */
  correlationId?: string;
}

/**
 * Turn domain events into outbox envelopes on the given unit of work. They
 * are written to storage when the unit of work commits, in the same
 * transaction as the domain changes.
 *
 * All-or-nothing: if any event is unregistered or invalid, nothing from the
 * call is added.
 *
 * @example
 * const notifier = enqueue(uow, [{ type: 'student.enrolled', studentId: 's-1' }], { registry });
 * await uow.commit();
 * notifier.notify();
 */
export function enqueue<TTx, E extends DomainEvent>(
  unitOfWork: UnitOfWork<TTx>,
  events: readonly E[],
  options: EnqueueOptions,
): Notifier {
  const clock = options.clock ?? systemClock;
  const correlationId = options.correlationId ?? generateUlid();

  const envelopes: OutboxEnvelope[] = events.map((event) =>
    buildEnvelope({
      event,
      registration: options.registry.resolve(event.type),
      correlationId,
      occurredAt: clock.now(),
    }),
  );

  if (envelopes.length > 0) {
    unitOfWork.addEnvelopes(envelopes);
  }

  return new Notifier(
    envelopes.map((e) => e.id),
    unitOfWork,
    options.dispatcher ?? null,
  );
}
