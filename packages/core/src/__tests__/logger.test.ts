import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { errorFields, getLogLevel, logger, setLogLevel } from '../observability';
import type { LogLevel } from '../observability';

const stdout = () => vi.mocked(process.stdout.write);
const stderr = () => vi.mocked(process.stderr.write);

function lines(calls: ReadonlyArray<ReadonlyArray<unknown>>): Record<string, unknown>[] {
  return calls.map((call) => JSON.parse(String(call[0])));
}

describe('logger', () => {
  let previous: LogLevel;

  beforeEach(() => {
    previous = getLogLevel();
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    setLogLevel(previous);
    vi.restoreAllMocks();
  });

  it('writes one JSON line per entry to stdout', () => {
    setLogLevel('info');
    logger.info('Outbox dispatch cycle complete', { cycle: 3, messageId: 'm-1', topic: 'A' });

    expect(stdout()).toHaveBeenCalledTimes(1);
    expect(String(stdout().mock.calls[0]?.[0]).endsWith('\n')).toBe(true);
    expect(lines(stdout().mock.calls)[0]).toMatchObject({
      level: 'info',
      message: 'Outbox dispatch cycle complete',
      cycle: 3,
      messageId: 'm-1',
      topic: 'A',
    });
  });

  it('sends errors to stderr', () => {
    logger.error('Outbox dispatch cycle failed', { error: { message: 'boom' } });

    expect(stdout()).not.toHaveBeenCalled();
    expect(lines(stderr().mock.calls)[0]).toMatchObject({ level: 'error', error: { message: 'boom' } });
  });

  it('drops entries below the minimum level', () => {
    setLogLevel('warn');
    logger.info('hidden');
    logger.debug('hidden');
    logger.warn('shown');

    expect(lines(stdout().mock.calls).map((l) => l.message)).toEqual(['shown']);
  });

  it('does not let fields override the core keys', () => {
    logger.warn('real message', { message: 'spoofed', level: 'debug' });
    expect(lines(stdout().mock.calls)[0]).toMatchObject({ level: 'warn', message: 'real message' });
  });
});

describe('errorFields', () => {
  it('keeps the code of AppError-like errors', () => {
    const err = Object.assign(new Error('conflict'), { code: 'CONCURRENCY_CONFLICT' });
    expect(errorFields(err)).toMatchObject({ code: 'CONCURRENCY_CONFLICT', message: 'conflict' });
  });

  it('stringifies non-errors', () => {
    expect(errorFields('offline')).toEqual({ message: 'offline' });
  });
});
