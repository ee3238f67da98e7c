import { z } from 'zod';
import { assertValidated } from '@txbox/shared';

/**
 * Outbox runtime configuration, read from the environment once at startup.
 *
 * The publish retry knobs have no mandated defaults upstream; the values
 * below retry nothing in-cycle and fall back to cycle-level backoff.
 */
const OutboxEnvSchema = z.object({
  OUTBOX_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(5_000),
  OUTBOX_BATCH_SIZE: z.coerce.number().int().min(1).max(10_000).default(50),
  OUTBOX_STARTUP_DELAY_MS: z.coerce.number().int().min(0).default(2_000),
  OUTBOX_DRAIN_DELAY_MS: z.coerce.number().int().min(0).default(200),
  OUTBOX_MAX_BACKOFF_MS: z.coerce.number().int().positive().default(30_000),
  OUTBOX_MAX_PUBLISH_ATTEMPTS: z.coerce.number().int().min(1).default(1),
  OUTBOX_PUBLISH_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(250),
  OUTBOX_PUBLISH_TIMEOUT_MS: z.coerce.number().int().min(0).default(30_000),
  DATABASE_URL: z.string().url().optional(),
  AMQP_URL: z.string().url().optional(),
});

export interface DispatcherTuning {
  pollIntervalMs: number;
  batchSize: number;
  startupDelayMs: number;
  drainDelayMs: number;
  maxBackoffMs: number;
  maxPublishAttempts: number;
  publishRetryDelayMs: number;
  publishTimeoutMs: number;
}

export interface OutboxConfig {
  dispatcher: DispatcherTuning;
  databaseUrl?: string;
  amqpUrl?: string;
}

export function loadOutboxConfig(
  env: Record<string, string | undefined> = process.env,
): OutboxConfig {
  // Empty strings come from `FOO=` lines in .env files; treat them as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = OutboxEnvSchema.safeParse(present);
  assertValidated(parsed, 'Invalid outbox configuration');
  const vars = parsed.data;

  return {
    dispatcher: {
      pollIntervalMs: vars.OUTBOX_POLL_INTERVAL_MS,
      batchSize: vars.OUTBOX_BATCH_SIZE,
      startupDelayMs: vars.OUTBOX_STARTUP_DELAY_MS,
      drainDelayMs: vars.OUTBOX_DRAIN_DELAY_MS,
      maxBackoffMs: vars.OUTBOX_MAX_BACKOFF_MS,
      maxPublishAttempts: vars.OUTBOX_MAX_PUBLISH_ATTEMPTS,
      publishRetryDelayMs: vars.OUTBOX_PUBLISH_RETRY_DELAY_MS,
      publishTimeoutMs: vars.OUTBOX_PUBLISH_TIMEOUT_MS,
    },
    databaseUrl: vars.DATABASE_URL,
    amqpUrl: vars.AMQP_URL,
  };
}
