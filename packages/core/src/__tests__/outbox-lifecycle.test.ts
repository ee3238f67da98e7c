import { describe, it, expect, vi, afterEach } from 'vitest';
import { AppError } from '@txbox/shared';
import {
  getMessageRegistry,
  getOutbox,
  getOutboxDispatcher,
  initializeOutbox,
  shutdownOutbox,
  setOutboxDispatcher,
} from '../events';
import { InMemoryBroker } from '../events/brokers/in-memory-broker';
import { InMemoryUnitOfWorkFactory } from '../events/in-memory-storage';
import { withUnitOfWork } from '../events/unit-of-work';
import { enrolled, studentRegistry } from '../events/__tests__/helpers';

describe('outbox lifecycle', () => {
  afterEach(async () => {
    await shutdownOutbox();
    setOutboxDispatcher(null);
  });

  it('wires the process-wide outbox and delivers through it', async () => {
    const factory = new InMemoryUnitOfWorkFactory();
    const broker = new InMemoryBroker();
    const registry = studentRegistry();

    const dispatcher = initializeOutbox({
      registry,
      unitOfWork: factory,
      broker,
      tuning: { pollIntervalMs: 60_000, startupDelayMs: 60_000 },
    });

    expect(getMessageRegistry()).toBe(registry);
    expect(getOutboxDispatcher()).toBe(dispatcher);
    expect(dispatcher.isRunning()).toBe(true);

    const notifier = await withUnitOfWork(factory, async (uow) =>
      getOutbox().enqueue(uow, [enrolled('s-1')]),
    );
    expect(notifier.notify()).toBe('signalled');

    await vi.waitFor(() => expect(broker.publishedIds()).toEqual(notifier.messageIds));
  });

  it('refuses to start a second dispatcher while one is running', () => {
    const options = {
      unitOfWork: new InMemoryUnitOfWorkFactory(),
      broker: new InMemoryBroker(),
      tuning: { startupDelayMs: 60_000 },
    };
    initializeOutbox(options);

    expect(() => initializeOutbox(options)).toThrow(AppError);
  });

  it('stops the dispatcher on shutdown', async () => {
    const dispatcher = initializeOutbox({
      unitOfWork: new InMemoryUnitOfWorkFactory(),
      broker: new InMemoryBroker(),
      tuning: { startupDelayMs: 60_000 },
    });

    await shutdownOutbox();

    expect(dispatcher.isRunning()).toBe(false);
    expect(dispatcher.state).toBe('stopped');
  });
});
