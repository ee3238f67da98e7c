export { outboxMessages } from './outbox';
export type { OutboxMessageRow, NewOutboxMessageRow } from './outbox';
