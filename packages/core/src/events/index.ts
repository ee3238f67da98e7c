import { AppError } from '@txbox/shared';
import { logger } from '../observability/logger';
import type { DispatcherTuning } from '../config/outbox-config';
import type { MessageBroker } from './broker';
import { InMemoryBroker } from './brokers/in-memory-broker';
import { OutboxDispatcher } from './dispatcher';
import { DrizzleUnitOfWorkFactory } from './drizzle-unit-of-work';
import { Outbox } from './outbox';
import type { MessageRegistry } from './registry';
import type { UnitOfWorkFactory } from './unit-of-work';

let messageRegistry: MessageRegistry | null = null;
let unitOfWorkFactory: UnitOfWorkFactory | null = null;
let messageBroker: MessageBroker | null = null;
let dispatcher: OutboxDispatcher | null = null;
let outbox: Outbox | null = null;

export function getMessageRegistry(): MessageRegistry {
  if (!messageRegistry) {
    throw new AppError('OUTBOX_NOT_CONFIGURED', 'No message registry has been set', 500);
  }
  return messageRegistry;
}

export function setMessageRegistry(registry: MessageRegistry): void {
  messageRegistry = registry;
  outbox = null;
}

export function getUnitOfWorkFactory(): UnitOfWorkFactory {
  if (!unitOfWorkFactory) {
    unitOfWorkFactory = new DrizzleUnitOfWorkFactory();
  }
  return unitOfWorkFactory;
}

export function setUnitOfWorkFactory(factory: UnitOfWorkFactory): void {
  unitOfWorkFactory = factory;
}

export function getMessageBroker(): MessageBroker {
  if (!messageBroker) {
    logger.warn('No message broker set, publishing to an in-memory broker');
    messageBroker = new InMemoryBroker();
  }
  return messageBroker;
}

export function setMessageBroker(broker: MessageBroker): void {
  messageBroker = broker;
}

export function getOutboxDispatcher(): OutboxDispatcher {
  if (!dispatcher) {
    dispatcher = new OutboxDispatcher({
      unitOfWork: getUnitOfWorkFactory(),
      broker: getMessageBroker(),
    });
  }
  return dispatcher;
}

export function setOutboxDispatcher(next: OutboxDispatcher | null): void {
  dispatcher = next;
  outbox?.attachDispatcher(next);
}

export function getOutbox(): Outbox {
  if (!outbox) {
    outbox = new Outbox({ registry: getMessageRegistry(), dispatcher: dispatcher ?? undefined });
  }
  return outbox;
}

export interface InitializeOutboxOptions {
  /** Optional for processes that only dispatch. */
  registry?: MessageRegistry;
  unitOfWork?: UnitOfWorkFactory;
  broker?: MessageBroker;
  tuning?: Partial<DispatcherTuning>;
}

/** Wire the process-wide outbox and start its dispatcher. */
export function initializeOutbox(options: InitializeOutboxOptions): OutboxDispatcher {
  if (dispatcher?.isRunning()) {
    throw new AppError('OUTBOX_ALREADY_RUNNING', 'Outbox dispatcher is already running', 500);
  }
  if (options.registry) setMessageRegistry(options.registry);
  if (options.unitOfWork) setUnitOfWorkFactory(options.unitOfWork);
  if (options.broker) setMessageBroker(options.broker);

  const next = new OutboxDispatcher({
    unitOfWork: getUnitOfWorkFactory(),
    broker: getMessageBroker(),
    ...options.tuning,
  });
  setOutboxDispatcher(next);
  next.start();

  logger.info('Outbox initialized', {
    eventTypes: messageRegistry?.eventTypes() ?? [],
    topics: messageRegistry?.topics() ?? [],
  });
  return next;
}

/** Stop the dispatcher, letting an in-flight cycle finish first. */
export async function shutdownOutbox(): Promise<void> {
  if (dispatcher) {
    await dispatcher.stop();
  }
  logger.info('Outbox shut down');
}

export { DEFAULT_MESSAGE_FORMAT } from '@txbox/shared';
export type { OutboxEnvelope } from '@txbox/shared';
export { defineMessageRegistry, registerMessage } from './registry';
export type {
  DomainEvent,
  MessageRegistration,
  MessageRegistry,
  ResolvedRegistration,
} from './registry';
export { buildEnvelope } from './envelope';
export { enqueue } from './enqueue';
export type { EnqueueOptions } from './enqueue';
export { Notifier } from './notifier';
export type { NotifyOutcome } from './notifier';
export { Outbox } from './outbox';
export type { OutboxOptions } from './outbox';
export { TransactionalUnitOfWork, withUnitOfWork } from './unit-of-work';
export type {
  UnitOfWork,
  UnitOfWorkFactory,
  UnitOfWorkState,
  TransactionControl,
} from './unit-of-work';
export type { OutboxStore } from './outbox-store';
export { DrizzleOutboxStore } from './drizzle-outbox-store';
export { DrizzleUnitOfWorkFactory } from './drizzle-unit-of-work';
export type { DrizzleUnitOfWorkOptions } from './drizzle-unit-of-work';
export {
  InMemoryDatabase,
  InMemoryTransaction,
  InMemoryOutboxStore,
  InMemoryUnitOfWorkFactory,
} from './in-memory-storage';
export { toOutgoingMessage } from './broker';
export type { MessageBroker, OutgoingMessage, OutgoingMessageHeaders } from './broker';
export { InMemoryBroker } from './brokers/in-memory-broker';
export { AmqpBroker } from './brokers/amqp-broker';
export type { AmqpBrokerOptions, ConfirmPublisher } from './brokers/amqp-broker';
export { OutboxDispatcher } from './dispatcher';
export type {
  DispatcherOptions,
  DispatcherState,
  DispatcherStats,
  DispatchCycleResult,
  DispatchHalt,
  WakeOutcome,
  WakeTarget,
} from './dispatcher';
export { WakeSignal } from './wake-signal';
export type { WakeReason } from './wake-signal';
export { systemClock } from './clock';
export type { Clock } from './clock';
