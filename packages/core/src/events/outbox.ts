import type { Clock } from './clock';
import type { WakeTarget } from './dispatcher';
import { enqueue } from './enqueue';
import type { Notifier } from './notifier';
import type { DomainEvent, MessageRegistry } from './registry';
import type { UnitOfWork } from './unit-of-work';

export interface OutboxOptions {
  registry: MessageRegistry;
  dispatcher?: WakeTarget;
  clock?: Clock;
}

/** Binds a registry and dispatcher so callers only pass the unit of work. */
export class Outbox {
  readonly registry: MessageRegistry;
  private dispatcher: WakeTarget | null;
  private readonly clock: Clock | undefined;

  constructor(options: OutboxOptions) {
    this.registry = options.registry;
    this.dispatcher = options.dispatcher ?? null;
    this.clock = options.clock;
  }

  attachDispatcher(dispatcher: WakeTarget | null): void {
    this.dispatcher = dispatcher;
  }

  enqueue<TTx, E extends DomainEvent>(
    unitOfWork: UnitOfWork<TTx>,
    events: readonly E[],
    options: { correlationId?: string } = {},
  ): Notifier {
    return enqueue(unitOfWork, events, {
      registry: this.registry,
      dispatcher: this.dispatcher,
      clock: this.clock,
      correlationId: options.correlationId,
    });
  }
}
