/**
 * Structured JSON logger: one line per entry on stdout (stderr for errors),
 * ready for any log drain.
 *
 * Every log line is valid JSON with consistent fields for filtering/alerting.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  messageId?: string;
  correlationId?: string;
  topic?: string;
  cycle?: number;
  durationMs?: number;
  error?: {
    code?: string;
    message: string;
    stack?: string;
  };
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

const envLevel = process.env.LOG_LEVEL;
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

function emit(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === 'error') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

export function log(level: LogLevel, message: string, fields?: Partial<LogEntry>): void {
  if (!shouldLog(level)) return;
  emit({
    ...fields,
    timestamp: new Date().toISOString(),
    level,
    message,
  });
}

/** Shape an unknown thrown value for the `error` field. */
export function errorFields(err: unknown): NonNullable<LogEntry['error']> {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return { code, message: err.message, stack: err.stack };
  }
  return { message: String(err) };
}

export const logger = {
  debug: (message: string, fields?: Partial<LogEntry>) => log('debug', message, fields),
  info: (message: string, fields?: Partial<LogEntry>) => log('info', message, fields),
  warn: (message: string, fields?: Partial<LogEntry>) => log('warn', message, fields),
  error: (message: string, fields?: Partial<LogEntry>) => log('error', message, fields),
};
