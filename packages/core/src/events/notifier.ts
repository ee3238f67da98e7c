import type { WakeOutcome, WakeTarget } from './dispatcher';
import type { UnitOfWorkState } from './unit-of-work';

export type NotifyOutcome = WakeOutcome;

/**
 * Handle returned by `enqueue`. `notify()` asks the dispatcher for an early
 * cycle, but only once the owning unit of work has committed; before that,
 * or after a rollback, it does nothing.
 */
export class Notifier {
  constructor(
    readonly messageIds: readonly string[],
    private readonly unitOfWork: { readonly state: UnitOfWorkState },
    private readonly target: WakeTarget | null,
  ) {}

  notify(): NotifyOutcome {
    if (this.messageIds.length === 0) return 'skipped';
    if (!this.target) return 'skipped';
    if (this.unitOfWork.state !== 'committed') return 'skipped';
    return this.target.wake();
  }
}
