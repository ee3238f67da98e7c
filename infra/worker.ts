/**
 * Outbox dispatcher process, run as a standalone container.
 *
 * Polls outbox_messages for undispatched envelopes and publishes them to
 * RabbitMQ (or an in-memory broker when AMQP_URL is unset).
 *
 * Usage: node --import tsx infra/worker.ts
 * Docker: CMD ["node", "--import", "tsx", "infra/worker.ts"]
 */

import { config } from 'dotenv';
import { fileURLToPath } from 'node:url';

// Load env
config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) });
config({ path: fileURLToPath(new URL('../.env', import.meta.url)) });

import { closeDb, createDb } from '@txbox/db';
import {
  AmqpBroker,
  DrizzleOutboxStore,
  DrizzleUnitOfWorkFactory,
  InMemoryBroker,
  initializeOutbox,
  loadOutboxConfig,
  shutdownOutbox,
} from '@txbox/core';
import { logger, errorFields, getLogLevel } from '@txbox/core/observability';

const HEALTH_CHECK_INTERVAL = 5 * 60 * 1000; // 5 minutes

async function main() {
  logger.info('Worker starting', { pid: process.pid, logLevel: getLogLevel() });

  const outboxConfig = loadOutboxConfig();
  const database = createDb({ connectionString: outboxConfig.databaseUrl });
  const { db } = database;
  const store = new DrizzleOutboxStore();

  let amqp: AmqpBroker | null = null;
  if (outboxConfig.amqpUrl) {
    amqp = await AmqpBroker.connect(outboxConfig.amqpUrl);
  } else {
    logger.warn('AMQP_URL is not set, messages go to an in-memory broker');
  }

  const dispatcher = initializeOutbox({
    unitOfWork: new DrizzleUnitOfWorkFactory({ db, store }),
    broker: amqp ?? new InMemoryBroker(),
    tuning: outboxConfig.dispatcher,
  });

  // Periodic health logging
  const healthInterval = setInterval(() => {
    db.transaction((tx) => store.countUndispatched(tx))
      .then((backlog) => {
        logger.info('Worker health', {
          ...dispatcher.getStats(),
          backlog,
          uptime: Math.round(process.uptime()),
          memoryMB: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
        });
      })
      .catch((err: unknown) => {
        logger.warn('Worker health check failed', { error: errorFields(err) });
      });
  }, HEALTH_CHECK_INTERVAL);

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Worker shutting down (${signal})`);
    clearInterval(healthInterval);
    await shutdownOutbox();
    await amqp?.close();
    await closeDb(database);
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error('Worker shutdown failed', { error: errorFields(err) });
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  logger.info('Worker ready, polling outbox');
}

main().catch((err: unknown) => {
  logger.error('Worker failed to start', { error: errorFields(err) });
  process.exit(1);
});
