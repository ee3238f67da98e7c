import { and, asc, count, inArray, isNull } from 'drizzle-orm';
import { outboxMessages } from '@txbox/db';
import type { OutboxMessageRow, Transaction } from '@txbox/db';
import { OutboxEnvelopeSchema, assertValidated } from '@txbox/shared';
import type { OutboxEnvelope } from '@txbox/shared';
import type { OutboxStore } from './outbox-store';

function toEnvelope(row: OutboxMessageRow): OutboxEnvelope {
  const parsed = OutboxEnvelopeSchema.safeParse(row);
  assertValidated(parsed, `Outbox row ${row.id} is malformed`);
  return parsed.data;
}

export class DrizzleOutboxStore implements OutboxStore<Transaction> {
  async insert(tx: Transaction, envelopes: readonly OutboxEnvelope[]): Promise<void> {
    if (envelopes.length === 0) return;
    await tx.insert(outboxMessages).values(
      envelopes.map((envelope) => ({
        id: envelope.id,
        correlationId: envelope.correlationId,
        topic: envelope.topic,
        key: envelope.key,
        type: envelope.type,
        format: envelope.format,
        data: envelope.data,
        occurredAt: envelope.occurredAt,
        processedAt: null,
      })),
    );
  }

  async selectUndispatched(tx: Transaction, limit: number): Promise<OutboxEnvelope[]> {
    // SKIP LOCKED: rows held by another dispatcher's open cycle are left to it.
    const rows = await tx
      .select()
      .from(outboxMessages)
      .where(isNull(outboxMessages.processedAt))
      .orderBy(asc(outboxMessages.occurredAt), asc(outboxMessages.id))
      .limit(limit)
      .for('update', { skipLocked: true });
    return rows.map(toEnvelope);
  }

  async markDispatched(
    tx: Transaction,
    ids: readonly string[],
    dispatchedAt: Date,
  ): Promise<number> {
    if (ids.length === 0) return 0;
    const updated = await tx
      .update(outboxMessages)
      .set({ processedAt: dispatchedAt })
      .where(and(inArray(outboxMessages.id, [...ids]), isNull(outboxMessages.processedAt)))
      .returning({ id: outboxMessages.id });
    return updated.length;
  }

  async countUndispatched(tx: Transaction): Promise<number> {
    const [row] = await tx
      .select({ value: count() })
      .from(outboxMessages)
      .where(isNull(outboxMessages.processedAt));
    return row?.value ?? 0;
  }
}
