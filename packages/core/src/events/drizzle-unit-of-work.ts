import { getDb } from '@txbox/db';
import type { Database, Transaction } from '@txbox/db';
import { toStorageError } from '@txbox/shared';
import { deferred } from './deferred';
import { DrizzleOutboxStore } from './drizzle-outbox-store';
import type { OutboxStore } from './outbox-store';
import { TransactionalUnitOfWork } from './unit-of-work';
import type { UnitOfWork, UnitOfWorkFactory } from './unit-of-work';

export type IsolationLevel = 'read committed' | 'repeatable read' | 'serializable';

export interface DrizzleUnitOfWorkOptions {
  /** Defaults to the process-wide database from `getDb()`. */
  db?: Database;
  store?: OutboxStore<Transaction>;
  isolationLevel?: IsolationLevel;
}

type TransactionOutcome = { ok: true } | { ok: false; error: unknown };

class RollbackRequested extends Error {
  constructor() {
    super('Unit of work rolled back');
    this.name = 'RollbackRequested';
  }
}

/**
 * Opens a drizzle transaction and keeps it open until the unit of work is
 * committed or rolled back. drizzle only exposes callback transactions, so
 * the callback parks on a deferred that `commit`/`rollback` settle.
 */
export class DrizzleUnitOfWorkFactory implements UnitOfWorkFactory<Transaction> {
  private readonly store: OutboxStore<Transaction>;

  constructor(private readonly options: DrizzleUnitOfWorkOptions = {}) {
    this.store = options.store ?? new DrizzleOutboxStore();
  }

  async begin(): Promise<UnitOfWork<Transaction>> {
    const db = this.options.db ?? getDb();
    const opened = deferred<Transaction>();
    const finish = deferred<void>();

    const settled: Promise<TransactionOutcome> = db
      .transaction(
        async (tx) => {
          opened.resolve(tx);
          await finish.promise;
        },
        { isolationLevel: this.options.isolationLevel ?? 'read committed' },
      )
      .then(
        (): TransactionOutcome => ({ ok: true }),
        (error: unknown): TransactionOutcome => ({ ok: false, error }),
      );

    const tx = await Promise.race([
      opened.promise,
      settled.then((outcome): never => {
        throw toStorageError(
          'begin',
          outcome.ok ? new Error('Transaction finished before it was used') : outcome.error,
        );
      }),
    ]);

    return new TransactionalUnitOfWork(tx, this.store, {
      commit: async () => {
        finish.resolve();
        const outcome = await settled;
        if (!outcome.ok) throw outcome.error;
      },
      rollback: async () => {
        finish.reject(new RollbackRequested());
        const outcome = await settled;
        if (!outcome.ok && !(outcome.error instanceof RollbackRequested)) {
          throw outcome.error;
        }
      },
    });
  }
}
