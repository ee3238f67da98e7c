import { BrokerPublishError, describeError } from '@txbox/shared';
import type { OutboxEnvelope } from '@txbox/shared';
import { logger, errorFields } from '../observability/logger';
import type { MessageBroker, OutgoingMessage } from './broker';
import { toOutgoingMessage } from './broker';
import { systemClock } from './clock';
import type { Clock } from './clock';
import type { UnitOfWork, UnitOfWorkFactory } from './unit-of-work';
import { WakeSignal } from './wake-signal';

export type DispatcherState =
  | 'stopped'
  | 'idle'
  | 'scanning'
  | 'publishing'
  | 'committing';

export type WakeOutcome = 'signalled' | 'coalesced' | 'skipped';

/** Something a Notifier can nudge. */
export interface WakeTarget {
  wake(): WakeOutcome;
}

export interface DispatcherOptions<TTx> {
  unitOfWork: UnitOfWorkFactory<TTx>;
  broker: MessageBroker;
  clock?: Clock;
  pollIntervalMs?: number;
  batchSize?: number;
  /** Delay before the first cycle after `start()`. */
  startupDelayMs?: number;
  /** Pause between back-to-back cycles while a backlog drains. */
  drainDelayMs?: number;
  maxBackoffMs?: number;
  /** Publish attempts per envelope within one cycle before the batch halts. */
  maxPublishAttempts?: number;
  publishRetryDelayMs?: number;
  /** A publish not confirmed within this counts as failed. 0 waits forever. */
  publishTimeoutMs?: number;
}

export interface DispatchHalt {
  messageId: string;
  error: BrokerPublishError;
}

export interface DispatchCycleResult {
  cycle: number;
  selected: number;
  published: number;
  dispatchedIds: string[];
  halted?: DispatchHalt;
}

export interface DispatcherStats {
  state: DispatcherState;
  cycles: number;
  published: number;
  failedCycles: number;
  consecutiveFailures: number;
  lastCycleAt: Date | null;
  lastError: string | null;
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Polling publisher. Each cycle opens its own unit of work, reads a batch of
 * undispatched envelopes in `occurredAt` order, publishes them one at a time
 * and marks the published ones dispatched before committing.
 *
 * A broker failure halts the batch at the failing envelope; it and everything
 * after it stay undispatched for the next cycle. Storage failures roll the
 * cycle back. Neither stops the loop.
 *
 * Cycles never overlap: a cycle in flight absorbs wake-ups into at most one
 * follow-up cycle.
 */
export class OutboxDispatcher<TTx = unknown> implements WakeTarget {
  private readonly unitOfWork: UnitOfWorkFactory<TTx>;
  private readonly broker: MessageBroker;
  private readonly clock: Clock;
  private readonly pollIntervalMs: number;
  private readonly batchSize: number;
  private readonly startupDelayMs: number;
  private readonly drainDelayMs: number;
  private readonly maxBackoffMs: number;
  private readonly maxPublishAttempts: number;
  private readonly publishRetryDelayMs: number;
  private readonly publishTimeoutMs: number;

  private readonly signal = new WakeSignal();
  private running = false;
  private generation = 0;
  private loop: Promise<void> | null = null;
  private inFlight: Promise<DispatchCycleResult> | null = null;
  private currentState: DispatcherState = 'stopped';
  private cycles = 0;
  private published = 0;
  private failedCycles = 0;
  private consecutiveFailures = 0;
  private lastCycleAt: Date | null = null;
  private lastErrorMessage: string | null = null;

  constructor(options: DispatcherOptions<TTx>) {
    this.unitOfWork = options.unitOfWork;
    this.broker = options.broker;
    this.clock = options.clock ?? systemClock;
    this.pollIntervalMs = options.pollIntervalMs ?? 5_000;
    this.batchSize = options.batchSize ?? 50;
    this.startupDelayMs = options.startupDelayMs ?? 2_000;
    this.drainDelayMs = options.drainDelayMs ?? 200;
    this.maxBackoffMs = options.maxBackoffMs ?? 30_000;
    this.maxPublishAttempts = Math.max(1, options.maxPublishAttempts ?? 1);
    this.publishRetryDelayMs = options.publishRetryDelayMs ?? 250;
    this.publishTimeoutMs = options.publishTimeoutMs ?? 30_000;
  }

  get state(): DispatcherState {
    return this.currentState;
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): DispatcherStats {
    return {
      state: this.currentState,
      cycles: this.cycles,
      published: this.published,
      failedCycles: this.failedCycles,
      consecutiveFailures: this.consecutiveFailures,
      lastCycleAt: this.lastCycleAt,
      lastError: this.lastErrorMessage,
    };
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.currentState = 'idle';
    this.signal.clear();
    logger.info('Outbox dispatcher started', {
      pollIntervalMs: this.pollIntervalMs,
      batchSize: this.batchSize,
    });
    this.loop = this.runLoop(++this.generation);
  }

  /**
   * Stop polling. A cycle already in flight finishes (commit or rollback)
   * before the returned promise resolves. A `start()` made in the meantime
   * begins a new loop that this stop leaves running.
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.running = false;
    this.signal.wake();
    await loop;
    if (this.loop !== loop) return;
    this.loop = null;
    this.currentState = 'stopped';
    logger.info('Outbox dispatcher stopped', { cycles: this.cycles, published: this.published });
  }

  /**
   * Request a cycle now instead of at the next tick. While a cycle is in
   * flight the request becomes the single follow-up cycle.
   */
  wake(): WakeOutcome {
    if (!this.running) return 'skipped';
    const fresh = this.signal.wake();
    return fresh && !this.inFlight ? 'signalled' : 'coalesced';
  }

  /**
   * Run one dispatch cycle. A call made while another cycle is in flight
   * joins that cycle instead of starting a second one.
   */
  runCycle(): Promise<DispatchCycleResult> {
    if (this.inFlight) return this.inFlight;
    const cycle = this.executeCycle().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async runLoop(generation: number): Promise<void> {
    const current = () => this.running && this.generation === generation;
    let wait = this.startupDelayMs;
    while (current()) {
      await this.signal.wait(wait);
      if (!current()) break;
      wait = await this.cycleAndSchedule();
    }
  }

  /** Runs a cycle and returns how long to wait before the next one. */
  private async cycleAndSchedule(): Promise<number> {
    try {
      const result = await this.runCycle();
      if (result.halted) {
        return this.recordFailure(result.halted.error);
      }
      this.recordSuccess();
      return result.selected >= this.batchSize ? this.drainDelayMs : this.pollIntervalMs;
    } catch (err) {
      return this.recordFailure(err);
    }
  }

  private async executeCycle(): Promise<DispatchCycleResult> {
    this.signal.acknowledge();
    const cycle = ++this.cycles;
    const startedAt = Date.now();
    this.currentState = 'scanning';

    let uow: UnitOfWork<TTx> | null = null;
    try {
      uow = await this.unitOfWork.begin();
      const batch = await uow.getUndispatchedEnvelopes(this.batchSize);
      if (batch.length === 0) {
        await uow.rollback();
        return { cycle, selected: 0, published: 0, dispatchedIds: [] };
      }

      this.currentState = 'publishing';
      const dispatchedIds: string[] = [];
      let halted: DispatchHalt | undefined;
      for (const envelope of batch) {
        try {
          await this.publishEnvelope(envelope);
          dispatchedIds.push(envelope.id);
        } catch (err) {
          if (!(err instanceof BrokerPublishError)) throw err;
          halted = { messageId: envelope.id, error: err };
          break;
        }
      }

      this.currentState = 'committing';
      await uow.markDispatched(dispatchedIds, this.clock.now());
      await uow.commit();

      this.published += dispatchedIds.length;
      this.lastCycleAt = this.clock.now();
      logger.info('Outbox dispatch cycle complete', {
        cycle,
        selected: batch.length,
        published: dispatchedIds.length,
        halted: halted?.messageId,
        durationMs: Date.now() - startedAt,
      });
      return { cycle, selected: batch.length, published: dispatchedIds.length, dispatchedIds, halted };
    } catch (err) {
      if (uow) {
        await uow.rollback().catch((rollbackErr: unknown) => {
          logger.warn('Outbox cycle rollback failed', { cycle, error: errorFields(rollbackErr) });
        });
      }
      throw err;
    } finally {
      this.currentState = this.running ? 'idle' : 'stopped';
    }
  }

  private async publishEnvelope(envelope: OutboxEnvelope): Promise<void> {
    const message = toOutgoingMessage(envelope);
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxPublishAttempts; attempt++) {
      try {
        await this.publishWithTimeout(message);
        return;
      } catch (err) {
        lastError = err;
        logger.warn('Outbox publish attempt failed', {
          messageId: envelope.id,
          topic: envelope.topic,
          attempt,
          maxAttempts: this.maxPublishAttempts,
          error: errorFields(err),
        });
        if (attempt < this.maxPublishAttempts && this.publishRetryDelayMs > 0) {
          await delay(this.publishRetryDelayMs);
        }
      }
    }
    throw new BrokerPublishError(envelope.id, envelope.topic, this.maxPublishAttempts, lastError);
  }

  private async publishWithTimeout(message: OutgoingMessage): Promise<void> {
    const publishing = this.broker.publish(message);
    if (this.publishTimeoutMs <= 0) return publishing;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Publish not confirmed within ${this.publishTimeoutMs}ms`)),
        this.publishTimeoutMs,
      );
    });
    // race() keeps listening to the abandoned publish, so a late rejection stays handled.
    try {
      await Promise.race([publishing, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private recordSuccess(): void {
    this.consecutiveFailures = 0;
    this.lastErrorMessage = null;
  }

  private recordFailure(err: unknown): number {
    this.failedCycles++;
    this.consecutiveFailures++;
    const message = describeError(err);
    // Log the first failure and every change of cause; a stuck broker or
    // database would otherwise log every tick.
    if (this.consecutiveFailures === 1 || message !== this.lastErrorMessage) {
      logger.error('Outbox dispatch cycle failed (will retry with backoff)', {
        consecutiveFailures: this.consecutiveFailures,
        error: errorFields(err),
      });
    } else if (this.consecutiveFailures === 5) {
      logger.error('Outbox dispatch still failing, suppressing repeats', {
        consecutiveFailures: this.consecutiveFailures,
      });
    }
    this.lastErrorMessage = message;
    return Math.min(
      this.pollIntervalMs * Math.pow(2, this.consecutiveFailures - 1),
      this.maxBackoffMs,
    );
  }
}
