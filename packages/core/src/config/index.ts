export { loadOutboxConfig } from './outbox-config';
export type { OutboxConfig, DispatcherTuning } from './outbox-config';
