import { describe, it, expect } from 'vitest';
import { getTableConfig } from 'drizzle-orm/pg-core';
import { outboxMessages } from '../schema';

describe('outbox_messages table', () => {
  const config = getTableConfig(outboxMessages);

  it('is named outbox_messages', () => {
    expect(config.name).toBe('outbox_messages');
  });

  it('declares every envelope column', () => {
    expect(config.columns.map((c) => c.name).sort()).toEqual([
      'correlation_id',
      'data',
      'format',
      'id',
      'key',
      'occurred_at',
      'processed_at',
      'topic',
      'type',
    ]);
  });

  it('keys rows by message id', () => {
    const id = config.columns.find((c) => c.name === 'id');
    expect(id?.primary).toBe(true);
  });

  it('only processed_at is nullable', () => {
    const nullable = config.columns.filter((c) => !c.notNull).map((c) => c.name);
    expect(nullable).toEqual(['processed_at']);
  });

  it('indexes undispatched rows by occurred_at', () => {
    expect(config.indexes).toHaveLength(1);
    expect(config.indexes[0]!.config.name).toBe('idx_outbox_undispatched');
  });
});
