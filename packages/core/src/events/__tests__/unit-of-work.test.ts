import { describe, it, expect, vi } from 'vitest';
import {
  ConcurrencyConflictError,
  StorageError,
  UnitOfWorkClosedError,
} from '@txbox/shared';
import { enqueue } from '../enqueue';
import { InMemoryDatabase, InMemoryUnitOfWorkFactory } from '../in-memory-storage';
import type { InMemoryTransaction } from '../in-memory-storage';
import type { OutboxStore } from '../outbox-store';
import { TransactionalUnitOfWork, withUnitOfWork } from '../unit-of-work';
import { enrolled, studentRegistry } from './helpers';

const registry = studentRegistry();

describe('TransactionalUnitOfWork', () => {
  it('commits domain rows and envelopes together', async () => {
    const factory = new InMemoryUnitOfWorkFactory();
    const uow = await factory.begin();
    uow.tx.put('enrollments', 'e-1', { studentId: 's-1', courseId: 'math-101' });
    const notifier = enqueue(uow, [enrolled('s-1', 'math-101')], { registry });

    await uow.commit();

    expect(uow.state).toBe('committed');
    expect(factory.database.get('enrollments', 'e-1')).toEqual({
      studentId: 's-1',
      courseId: 'math-101',
    });
    expect(factory.database.envelopes().map((e) => e.id)).toEqual(notifier.messageIds);
  });

  it('persists neither rows nor envelopes on rollback', async () => {
    const factory = new InMemoryUnitOfWorkFactory();
    const uow = await factory.begin();
    uow.tx.put('enrollments', 'e-1', { studentId: 's-1' });
    enqueue(uow, [enrolled('s-1')], { registry });

    await uow.rollback();

    expect(uow.state).toBe('rolled_back');
    expect(uow.pendingEnvelopes).toEqual([]);
    expect(factory.database.rows('enrollments')).toEqual([]);
    expect(factory.database.envelopes()).toEqual([]);
  });

  it('treats rollback after commit and a second rollback as no-ops', async () => {
    const factory = new InMemoryUnitOfWorkFactory();
    const committed = await factory.begin();
    enqueue(committed, [enrolled('s-1')], { registry });
    await committed.commit();
    await committed.rollback();
    expect(committed.state).toBe('committed');
    expect(factory.database.envelopes()).toHaveLength(1);

    const rolledBack = await factory.begin();
    await rolledBack.rollback();
    await rolledBack.rollback();
    expect(rolledBack.state).toBe('rolled_back');
  });

  it('refuses a second commit', async () => {
    const uow = await new InMemoryUnitOfWorkFactory().begin();
    await uow.commit();
    await expect(uow.commit()).rejects.toBeInstanceOf(UnitOfWorkClosedError);
  });

  it('raises ConcurrencyConflictError when another transaction won the row', async () => {
    const database = new InMemoryDatabase();
    const factory = new InMemoryUnitOfWorkFactory(database);
    const seed = await factory.begin();
    seed.tx.put('students', 's-1', { credits: 0 });
    await seed.commit();

    const first = await factory.begin();
    const second = await factory.begin();
    first.tx.put('students', 's-1', { credits: Number(first.tx.get('students', 's-1')?.credits) + 3 });
    second.tx.put('students', 's-1', { credits: Number(second.tx.get('students', 's-1')?.credits) + 4 });
    enqueue(second, [enrolled('s-1')], { registry });

    await first.commit();
    await expect(second.commit()).rejects.toBeInstanceOf(ConcurrencyConflictError);

    expect(second.state).toBe('rolled_back');
    expect(database.get('students', 's-1')).toEqual({ credits: 3 });
    expect(database.envelopes()).toEqual([]);
  });

  it('surfaces a failed commit and keeps nothing', async () => {
    const database = new InMemoryDatabase();
    const uow = await new InMemoryUnitOfWorkFactory(database).begin();
    uow.tx.put('enrollments', 'e-1', { studentId: 's-1' });
    enqueue(uow, [enrolled('s-1')], { registry });
    database.failNextCommit(new Error('connection reset'));

    const error = await uow.commit().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StorageError);
    expect((error as StorageError).message).toBe(
      'Storage operation "commit" failed: connection reset',
    );
    expect(uow.state).toBe('rolled_back');
    expect(database.rows('enrollments')).toEqual([]);
    expect(database.envelopes()).toEqual([]);
  });

  it('rolls back when the envelope insert fails', async () => {
    const tx = new InMemoryDatabase().begin();
    const rollback = vi.fn(() => tx.rollback());
    const store: OutboxStore<InMemoryTransaction> = {
      insert: vi.fn().mockRejectedValue(Object.assign(new Error('deadlock detected'), { code: '40P01' })),
      selectUndispatched: vi.fn(),
      markDispatched: vi.fn(),
      countUndispatched: vi.fn(),
    };
    const uow = new TransactionalUnitOfWork(tx, store, { commit: () => tx.commit(), rollback });
    enqueue(uow, [enrolled('s-1')], { registry });

    await expect(uow.commit()).rejects.toThrow(ConcurrencyConflictError);
    expect(rollback).toHaveBeenCalledTimes(1);
    expect(uow.state).toBe('rolled_back');
  });

  it('skips the storage call when marking an empty id list', async () => {
    const uow = await new InMemoryUnitOfWorkFactory().begin();
    expect(await uow.markDispatched([], new Date())).toBe(0);
  });
});

describe('withUnitOfWork', () => {
  it('commits when the work resolves', async () => {
    const factory = new InMemoryUnitOfWorkFactory();
    const result = await withUnitOfWork(factory, async (uow) => {
      uow.tx.put('enrollments', 'e-1', { studentId: 's-1' });
      return enqueue(uow, [enrolled('s-1')], { registry });
    });

    expect(factory.database.envelopes().map((e) => e.id)).toEqual(result.messageIds);
  });

  it('rolls back and rethrows when the work throws', async () => {
    const factory = new InMemoryUnitOfWorkFactory();
    await expect(
      withUnitOfWork(factory, async (uow) => {
        uow.tx.put('enrollments', 'e-1', { studentId: 's-1' });
        enqueue(uow, [enrolled('s-1')], { registry });
        throw new Error('course is full');
      }),
    ).rejects.toThrow('course is full');

    expect(factory.database.rows('enrollments')).toEqual([]);
    expect(factory.database.envelopes()).toEqual([]);
  });

  it('leaves a unit of work the work already finished alone', async () => {
    const factory = new InMemoryUnitOfWorkFactory();
    await withUnitOfWork(factory, async (uow) => {
      enqueue(uow, [enrolled('s-1')], { registry });
      await uow.rollback();
    });
    expect(factory.database.envelopes()).toEqual([]);
  });
});
