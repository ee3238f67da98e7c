import type { OutboxEnvelope } from '@txbox/shared';

/**
 * Durable storage of envelopes. Every call runs inside the transaction the
 * calling unit of work owns, so inserts land atomically with domain writes.
 *
 * Running more than one dispatcher against the same store requires
 * `selectUndispatched` to claim rows (row locks with skip-locked reads, or an
 * equivalent claim column) so two open transactions never see the same row.
 */
export interface OutboxStore<TTx> {
  insert(tx: TTx, envelopes: readonly OutboxEnvelope[]): Promise<void>;

  /** Undispatched rows only, oldest `occurredAt` first. */
  selectUndispatched(tx: TTx, limit: number): Promise<OutboxEnvelope[]>;

  /**
   * Set `processedAt` on rows where it is still null. Ids that are already
   * dispatched (or unknown) are skipped. Returns the number of rows changed.
   */
  markDispatched(tx: TTx, ids: readonly string[], dispatchedAt: Date): Promise<number>;

  countUndispatched(tx: TTx): Promise<number>;
}
