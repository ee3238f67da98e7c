// ── Outbox ──────────────────────────────────────────────────────────
export {
  getMessageRegistry,
  setMessageRegistry,
  getUnitOfWorkFactory,
  setUnitOfWorkFactory,
  getMessageBroker,
  setMessageBroker,
  getOutboxDispatcher,
  setOutboxDispatcher,
  getOutbox,
  initializeOutbox,
  shutdownOutbox,
  DEFAULT_MESSAGE_FORMAT,
  defineMessageRegistry,
  registerMessage,
  buildEnvelope,
  enqueue,
  Notifier,
  Outbox,
  TransactionalUnitOfWork,
  withUnitOfWork,
  DrizzleOutboxStore,
  DrizzleUnitOfWorkFactory,
  InMemoryDatabase,
  InMemoryTransaction,
  InMemoryOutboxStore,
  InMemoryUnitOfWorkFactory,
  toOutgoingMessage,
  InMemoryBroker,
  AmqpBroker,
  OutboxDispatcher,
  WakeSignal,
  systemClock,
} from './events';
export type {
  InitializeOutboxOptions,
  OutboxEnvelope,
  DomainEvent,
  MessageRegistration,
  MessageRegistry,
  ResolvedRegistration,
  EnqueueOptions,
  NotifyOutcome,
  OutboxOptions,
  UnitOfWork,
  UnitOfWorkFactory,
  UnitOfWorkState,
  TransactionControl,
  OutboxStore,
  DrizzleUnitOfWorkOptions,
  MessageBroker,
  OutgoingMessage,
  OutgoingMessageHeaders,
  AmqpBrokerOptions,
  ConfirmPublisher,
  DispatcherOptions,
  DispatcherState,
  DispatcherStats,
  DispatchCycleResult,
  DispatchHalt,
  WakeOutcome,
  WakeTarget,
  WakeReason,
  Clock,
} from './events';

// ── Configuration ───────────────────────────────────────────────────
export { loadOutboxConfig } from './config';
export type { OutboxConfig, DispatcherTuning } from './config';

// ── Observability ───────────────────────────────────────────────────
export { logger, log, setLogLevel, getLogLevel, errorFields } from './observability';
export type { LogLevel, LogEntry } from './observability';
