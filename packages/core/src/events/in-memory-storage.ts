import {
  ConcurrencyConflictError,
  StorageError,
  UnitOfWorkClosedError,
  generateUlid,
  isDispatched,
} from '@txbox/shared';
import type { OutboxEnvelope } from '@txbox/shared';
import type { OutboxStore } from './outbox-store';
import { TransactionalUnitOfWork } from './unit-of-work';
import type { UnitOfWork, UnitOfWorkFactory } from './unit-of-work';

export type Row = Record<string, unknown>;

interface VersionedRow {
  value: Row;
  version: number;
}

interface StagedWrite {
  table: string;
  id: string;
  value: Row | null;
  baseVersion: number;
}

function rowKey(table: string, id: string): string {
  return `${table}\u0000${id}`;
}

function byOccurrence(a: OutboxEnvelope, b: OutboxEnvelope): number {
  const diff = a.occurredAt.getTime() - b.occurredAt.getTime();
  if (diff !== 0) return diff;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Process-local storage with real transaction semantics: writes are staged
 * per transaction and applied together on commit, first committer wins on a
 * row (later committers get ConcurrencyConflictError), and outbox rows read
 * for dispatch are claimed until the reading transaction finishes.
 *
 * Nothing survives a restart; use it for tests and local runs.
 */
export class InMemoryDatabase {
  private readonly tables = new Map<string, Map<string, VersionedRow>>();
  private readonly outbox = new Map<string, OutboxEnvelope>();
  private readonly claims = new Map<string, string>();
  private readonly commitFailures: unknown[] = [];

  begin(): InMemoryTransaction {
    return new InMemoryTransaction(this);
  }

  /** Committed state of a domain row. */
  get(table: string, id: string): Row | undefined {
    const row = this.tables.get(table)?.get(id);
    return row ? { ...row.value } : undefined;
  }

  rows(table: string): Row[] {
    return [...(this.tables.get(table)?.values() ?? [])].map((r) => ({ ...r.value }));
  }

  /** Committed outbox rows, oldest first. */
  envelopes(): OutboxEnvelope[] {
    return [...this.outbox.values()].sort(byOccurrence).map((e) => ({ ...e }));
  }

  envelope(id: string): OutboxEnvelope | undefined {
    const envelope = this.outbox.get(id);
    return envelope ? { ...envelope } : undefined;
  }

  /** Make the next commit fail with `error` after validation, as a lost connection would. */
  failNextCommit(error: unknown): void {
    this.commitFailures.push(error);
  }

  versionOf(table: string, id: string): number {
    return this.tables.get(table)?.get(id)?.version ?? 0;
  }

  /** Committed outbox rows not yet dispatched, oldest first. */
  undispatched(): OutboxEnvelope[] {
    return [...this.outbox.values()]
      .filter((e) => !isDispatched(e))
      .sort(byOccurrence)
      .map((e) => ({ ...e }));
  }

  isClaimedByOther(envelopeId: string, txId: string): boolean {
    const holder = this.claims.get(envelopeId);
    return holder !== undefined && holder !== txId;
  }

  claim(envelopeId: string, txId: string): void {
    this.claims.set(envelopeId, txId);
  }

  release(txId: string): void {
    for (const [envelopeId, holder] of this.claims) {
      if (holder === txId) this.claims.delete(envelopeId);
    }
  }

  applyCommit(
    writes: readonly StagedWrite[],
    inserted: readonly OutboxEnvelope[],
    marks: ReadonlyMap<string, Date>,
  ): void {
    for (const write of writes) {
      if (this.versionOf(write.table, write.id) !== write.baseVersion) {
        throw new ConcurrencyConflictError(
          `Row ${write.table}/${write.id} was modified by another transaction`,
        );
      }
    }
    for (const envelope of inserted) {
      if (this.outbox.has(envelope.id)) {
        throw new StorageError('insert', `duplicate outbox message id ${envelope.id}`);
      }
    }
    const failure = this.commitFailures.shift();
    if (failure !== undefined) throw failure;

    for (const write of writes) {
      let table = this.tables.get(write.table);
      if (!table) {
        table = new Map();
        this.tables.set(write.table, table);
      }
      if (write.value === null) {
        table.delete(write.id);
      } else {
        table.set(write.id, { value: { ...write.value }, version: write.baseVersion + 1 });
      }
    }
    for (const envelope of inserted) {
      this.outbox.set(envelope.id, { ...envelope, processedAt: null });
    }
    for (const [id, at] of marks) {
      const current = this.outbox.get(id);
      if (current && !isDispatched(current)) {
        this.outbox.set(id, { ...current, processedAt: at });
      }
    }
  }
}

export class InMemoryTransaction {
  readonly id = generateUlid();
  private readonly writes = new Map<string, StagedWrite>();
  private readonly readVersions = new Map<string, number>();
  private readonly inserted: OutboxEnvelope[] = [];
  private readonly marks = new Map<string, Date>();
  private closed = false;

  constructor(private readonly database: InMemoryDatabase) {}

  get(table: string, id: string): Row | undefined {
    this.assertOpen();
    const key = rowKey(table, id);
    const staged = this.writes.get(key);
    if (staged) return staged.value ? { ...staged.value } : undefined;
    if (!this.readVersions.has(key)) {
      this.readVersions.set(key, this.database.versionOf(table, id));
    }
    return this.database.get(table, id);
  }

  put(table: string, id: string, value: Row): void {
    this.stage(table, id, { ...value });
  }

  delete(table: string, id: string): void {
    this.stage(table, id, null);
  }

  insertEnvelopes(envelopes: readonly OutboxEnvelope[]): void {
    this.assertOpen();
    this.inserted.push(...envelopes.map((e) => ({ ...e })));
  }

  selectUndispatched(limit: number): OutboxEnvelope[] {
    this.assertOpen();
    const visible = [...this.database.undispatched(), ...this.inserted]
      .filter((e) => !this.marks.has(e.id) && !this.database.isClaimedByOther(e.id, this.id))
      .sort(byOccurrence)
      .slice(0, limit);
    for (const envelope of visible) {
      this.database.claim(envelope.id, this.id);
    }
    return visible.map((e) => ({ ...e }));
  }

  markDispatched(ids: readonly string[], dispatchedAt: Date): number {
    this.assertOpen();
    let changed = 0;
    for (const id of new Set(ids)) {
      if (this.marks.has(id)) continue;
      const committed = this.database.envelope(id);
      const own = this.inserted.find((e) => e.id === id);
      const current = committed ?? own;
      if (!current || isDispatched(current)) continue;
      this.marks.set(id, dispatchedAt);
      changed++;
    }
    return changed;
  }

  countUndispatched(): number {
    this.assertOpen();
    const committed = this.database.undispatched().filter((e) => !this.marks.has(e.id));
    return committed.length + this.inserted.filter((e) => !this.marks.has(e.id)).length;
  }

  async commit(): Promise<void> {
    this.assertOpen();
    this.closed = true;
    try {
      this.database.applyCommit([...this.writes.values()], this.inserted, this.marks);
    } finally {
      this.database.release(this.id);
    }
  }

  async rollback(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.database.release(this.id);
  }

  private stage(table: string, id: string, value: Row | null): void {
    this.assertOpen();
    const key = rowKey(table, id);
    const existing = this.writes.get(key);
    const baseVersion =
      existing?.baseVersion ?? this.readVersions.get(key) ?? this.database.versionOf(table, id);
    this.writes.set(key, { table, id, value, baseVersion });
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new UnitOfWorkClosedError(this.id, 'closed');
    }
  }
}

export class InMemoryOutboxStore implements OutboxStore<InMemoryTransaction> {
  async insert(tx: InMemoryTransaction, envelopes: readonly OutboxEnvelope[]): Promise<void> {
    tx.insertEnvelopes(envelopes);
  }

  async selectUndispatched(tx: InMemoryTransaction, limit: number): Promise<OutboxEnvelope[]> {
    return tx.selectUndispatched(limit);
  }

  async markDispatched(
    tx: InMemoryTransaction,
    ids: readonly string[],
    dispatchedAt: Date,
  ): Promise<number> {
    return tx.markDispatched(ids, dispatchedAt);
  }

  async countUndispatched(tx: InMemoryTransaction): Promise<number> {
    return tx.countUndispatched();
  }
}

export class InMemoryUnitOfWorkFactory implements UnitOfWorkFactory<InMemoryTransaction> {
  constructor(
    readonly database: InMemoryDatabase = new InMemoryDatabase(),
    private readonly store: OutboxStore<InMemoryTransaction> = new InMemoryOutboxStore(),
  ) {}

  async begin(): Promise<UnitOfWork<InMemoryTransaction>> {
    const tx = this.database.begin();
    return new TransactionalUnitOfWork(tx, this.store, {
      commit: () => tx.commit(),
      rollback: () => tx.rollback(),
    });
  }
}
