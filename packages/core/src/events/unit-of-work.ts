import { generateUlid, toStorageError, UnitOfWorkClosedError } from '@txbox/shared';
import type { OutboxEnvelope } from '@txbox/shared';
import { logger, errorFields } from '../observability/logger';
import type { OutboxStore } from './outbox-store';

export type UnitOfWorkState = 'active' | 'committed' | 'rolled_back';

/**
 * One atomic storage transaction. Domain writes go through `tx`; envelopes
 * added by `enqueue` are inserted into the outbox on `commit`, inside the
 * same transaction.
 */
export interface UnitOfWork<TTx = unknown> {
  readonly id: string;
  readonly state: UnitOfWorkState;
  readonly tx: TTx;
  readonly pendingEnvelopes: readonly OutboxEnvelope[];
  addEnvelopes(envelopes: readonly OutboxEnvelope[]): void;
  getUndispatchedEnvelopes(limit: number): Promise<OutboxEnvelope[]>;
  markDispatched(ids: readonly string[], dispatchedAt: Date): Promise<number>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface UnitOfWorkFactory<TTx = unknown> {
  begin(): Promise<UnitOfWork<TTx>>;
}

/** Finishes the underlying storage transaction. */
export interface TransactionControl {
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export class TransactionalUnitOfWork<TTx> implements UnitOfWork<TTx> {
  readonly id = generateUlid();
  private currentState: UnitOfWorkState = 'active';
  private finishing = false;
  private pending: OutboxEnvelope[] = [];

  constructor(
    readonly tx: TTx,
    private readonly store: OutboxStore<TTx>,
    private readonly control: TransactionControl,
  ) {}

  get state(): UnitOfWorkState {
    return this.currentState;
  }

  get pendingEnvelopes(): readonly OutboxEnvelope[] {
    return [...this.pending];
  }

  addEnvelopes(envelopes: readonly OutboxEnvelope[]): void {
    this.assertActive();
    this.pending.push(...envelopes);
  }

  async getUndispatchedEnvelopes(limit: number): Promise<OutboxEnvelope[]> {
    this.assertActive();
    try {
      return await this.store.selectUndispatched(this.tx, limit);
    } catch (err) {
      throw toStorageError('selectUndispatched', err);
    }
  }

  async markDispatched(ids: readonly string[], dispatchedAt: Date): Promise<number> {
    this.assertActive();
    if (ids.length === 0) return 0;
    try {
      return await this.store.markDispatched(this.tx, ids, dispatchedAt);
    } catch (err) {
      throw toStorageError('markDispatched', err);
    }
  }

  async commit(): Promise<void> {
    this.assertActive();
    this.finishing = true;

    if (this.pending.length > 0) {
      try {
        await this.store.insert(this.tx, this.pending);
      } catch (err) {
        await this.abortAfter(err);
        throw toStorageError('insert', err);
      }
    }

    try {
      await this.control.commit();
      this.currentState = 'committed';
    } catch (err) {
      // The driver has already rolled the transaction back.
      this.discard();
      throw toStorageError('commit', err);
    }
  }

  /** No-op once the unit of work has finished. */
  async rollback(): Promise<void> {
    if (this.currentState !== 'active' || this.finishing) return;
    this.finishing = true;
    try {
      await this.control.rollback();
    } catch (err) {
      throw toStorageError('rollback', err);
    } finally {
      this.discard();
    }
  }

  private async abortAfter(cause: unknown): Promise<void> {
    try {
      await this.control.rollback();
    } catch (err) {
      logger.warn('Rollback after failed write also failed', {
        unitOfWorkId: this.id,
        cause: errorFields(cause),
        error: errorFields(err),
      });
    } finally {
      this.discard();
    }
  }

  private discard(): void {
    this.pending = [];
    this.currentState = 'rolled_back';
  }

  private assertActive(): void {
    if (this.currentState !== 'active' || this.finishing) {
      throw new UnitOfWorkClosedError(this.id, this.finishing ? 'finishing' : this.currentState);
    }
  }
}

/**
 * Run `work` inside a fresh unit of work. Commits when `work` resolves and the
 * unit of work is still active; rolls back when it throws.
 */
export async function withUnitOfWork<TTx, T>(
  factory: UnitOfWorkFactory<TTx>,
  work: (uow: UnitOfWork<TTx>) => Promise<T>,
): Promise<T> {
  const uow = await factory.begin();
  try {
    const result = await work(uow);
    if (uow.state === 'active') {
      await uow.commit();
    }
    return result;
  } catch (err) {
    await uow.rollback().catch((rollbackErr: unknown) => {
      logger.warn('Rollback failed after unit of work error', {
        unitOfWorkId: uow.id,
        error: errorFields(rollbackErr),
      });
    });
    throw err;
  }
}
