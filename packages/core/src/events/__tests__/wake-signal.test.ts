import { describe, it, expect, vi, afterEach } from 'vitest';
import { WakeSignal } from '../wake-signal';

describe('WakeSignal', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with timeout when nobody wakes it', async () => {
    vi.useFakeTimers();
    const signal = new WakeSignal();
    const waiting = signal.wait(1_000);
    await vi.advanceTimersByTimeAsync(1_000);
    await expect(waiting).resolves.toBe('timeout');
  });

  it('resolves early on wake', async () => {
    const signal = new WakeSignal();
    const waiting = signal.wait(60_000);
    expect(signal.wake()).toBe(true);
    await expect(waiting).resolves.toBe('wake');
  });

  it('keeps a wake that arrives while nobody waits', async () => {
    const signal = new WakeSignal();
    expect(signal.wake()).toBe(true);
    expect(signal.isPending).toBe(true);
    expect(signal.wake()).toBe(false);

    await expect(signal.wait(60_000)).resolves.toBe('wake');
    expect(signal.isPending).toBe(false);
  });

  it('folds wakes into the delivered one until acknowledged', async () => {
    const signal = new WakeSignal();
    const waiting = signal.wait(60_000);
    signal.wake();
    await waiting;

    expect(signal.wake()).toBe(false);
    signal.acknowledge();
    expect(signal.wake()).toBe(true);
    expect(signal.wake()).toBe(false);
  });

  it('allows a single waiter', async () => {
    const signal = new WakeSignal();
    const first = signal.wait(60_000);
    await expect(signal.wait(10)).rejects.toThrow('WakeSignal already has a waiter');
    signal.wake();
    await first;
  });

  it('clear drops a pending wake', () => {
    const signal = new WakeSignal();
    signal.wake();
    signal.clear();
    expect(signal.isPending).toBe(false);
  });
});
