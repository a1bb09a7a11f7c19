export { ConsoleLogger, InMemoryLogger, NoopLogger, logError } from './logging.js';
export type { Logger, LogLevel, LogContext, LogEntry } from './logging.js';
