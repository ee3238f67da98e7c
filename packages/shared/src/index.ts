export {
  AppError,
  ValidationError,
  UnregisteredMessageTypeError,
  ConcurrencyConflictError,
  StorageError,
  BrokerPublishError,
  UnitOfWorkClosedError,
  describeError,
  toStorageError,
} from './errors';
export { generateUlid, isValidUlid } from './utils/ulid';
export { assertValidated } from './validation';
export {
  OutboxEnvelopeSchema,
  DEFAULT_MESSAGE_FORMAT,
  isDispatched,
} from './types/envelope';
export type { OutboxEnvelope } from './types/envelope';
