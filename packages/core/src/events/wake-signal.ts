export type WakeReason = 'wake' | 'timeout';

/**
 * Single-consumer wake channel. Wakes that arrive while the consumer is busy
 * collapse into one pending flag; the next `wait()` returns immediately and
 * clears it. Wakes that arrive after a wait returned but before the consumer
 * called `acknowledge()` fold into that same wake-up.
 */
export class WakeSignal {
  private pending = false;
  private delivered = false;
  private waiter: { resolve: (reason: WakeReason) => void; timer: ReturnType<typeof setTimeout> } | null =
    null;

  get isPending(): boolean {
    return this.pending;
  }

  /** Returns false when the wake was absorbed by one already on its way. */
  wake(): boolean {
    if (this.waiter) {
      const { resolve, timer } = this.waiter;
      this.waiter = null;
      clearTimeout(timer);
      this.delivered = true;
      resolve('wake');
      return true;
    }
    if (this.pending || this.delivered) return false;
    this.pending = true;
    return true;
  }

  wait(timeoutMs: number): Promise<WakeReason> {
    if (this.waiter) {
      return Promise.reject(new Error('WakeSignal already has a waiter'));
    }
    if (this.pending) {
      this.pending = false;
      this.delivered = true;
      return Promise.resolve('wake');
    }
    this.delivered = false;
    return new Promise<WakeReason>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        this.delivered = true;
        resolve('timeout');
      }, timeoutMs);
      this.waiter = { resolve, timer };
    });
  }

  /** The consumer has started acting on the last wake-up; new wakes queue again. */
  acknowledge(): void {
    this.delivered = false;
  }

  clear(): void {
    this.pending = false;
    this.delivered = false;
  }
}
