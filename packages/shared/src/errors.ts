export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 400,
    public details?: Array<{ field: string; message: string }>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    details?: Array<{ field: string; message: string }>,
  ) {
    super('VALIDATION_ERROR', message, 400, details);
    this.name = 'ValidationError';
  }
}

// ── Outbox errors ────────────────────────────────────────────────

export class UnregisteredMessageTypeError extends AppError {
  constructor(public eventType: string) {
    super(
      'UNREGISTERED_MESSAGE_TYPE',
      `No message registration for event type "${eventType}"`,
      400,
    );
    this.name = 'UnregisteredMessageTypeError';
  }
}

/** Storage rejected the write because another transaction touched the same rows. Retry the whole unit of work. */
export class ConcurrencyConflictError extends AppError {
  constructor(
    message: string = 'Concurrent modification detected',
    public override cause?: unknown,
  ) {
    super('CONCURRENCY_CONFLICT', message, 409);
    this.name = 'ConcurrencyConflictError';
  }
}

export class StorageError extends AppError {
  constructor(
    public operation: string,
    message: string,
    public override cause?: unknown,
  ) {
    super('STORAGE_ERROR', `Storage operation "${operation}" failed: ${message}`, 503);
    this.name = 'StorageError';
  }
}

export class BrokerPublishError extends AppError {
  constructor(
    public messageId: string,
    public topic: string,
    public attempts: number,
    public override cause?: unknown,
  ) {
    super(
      'BROKER_PUBLISH_ERROR',
      `Publishing message ${messageId} to "${topic}" failed after ${attempts} attempt(s): ${describeError(cause)}`,
      502,
    );
    this.name = 'BrokerPublishError';
  }
}

export class UnitOfWorkClosedError extends AppError {
  constructor(unitOfWorkId: string, state: string) {
    super('UNIT_OF_WORK_CLOSED', `Unit of work ${unitOfWorkId} is already ${state}`, 409);
    this.name = 'UnitOfWorkClosedError';
  }
}

// ── Classification ───────────────────────────────────────────────

// SQLSTATE codes Postgres raises when two transactions collide.
const CONFLICT_SQLSTATES = new Set(['40001', '40P01']);

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function sqlState(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Map a raw driver error onto the outbox taxonomy. AppErrors pass through
 * untouched so a conflict detected deeper down is not re-wrapped.
 */
export function toStorageError(operation: string, err: unknown): AppError {
  if (err instanceof AppError) return err;
  const code = sqlState(err);
  if (code && CONFLICT_SQLSTATES.has(code)) {
    return new ConcurrencyConflictError(describeError(err), err);
  }
  return new StorageError(operation, describeError(err), err);
}
