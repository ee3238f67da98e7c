export { logger, log, setLogLevel, getLogLevel, errorFields } from './logger';
export type { LogLevel, LogEntry } from './logger';
