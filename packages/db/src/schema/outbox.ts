import { pgTable, text, timestamp, index } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

// ── Outbox Messages ──────────────────────────────────────────────
// One row per enqueued envelope. processed_at is the only column that
// changes after insert, and only from NULL to a timestamp.
export const outboxMessages = pgTable(
  'outbox_messages',
  {
    id: text('id').primaryKey(),
    correlationId: text('correlation_id').notNull(),
    topic: text('topic').notNull(),
    key: text('key').notNull(),
    type: text('type').notNull(),
    format: text('format').notNull(),
    data: text('data').notNull(),
    occurredAt: timestamp('occurred_at', { withTimezone: true }).notNull(),
    processedAt: timestamp('processed_at', { withTimezone: true }),
  },
  (table) => [
    index('idx_outbox_undispatched')
      .on(table.occurredAt)
      .where(sql`${table.processedAt} IS NULL`),
  ],
);

export type OutboxMessageRow = typeof outboxMessages.$inferSelect;
export type NewOutboxMessageRow = typeof outboxMessages.$inferInsert;
