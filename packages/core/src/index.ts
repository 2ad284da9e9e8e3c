export type { LogLevel, LogEntry } from './observability/logger';
export { logger, log, setLogLevel, getLogLevel, isLogLevel, errorFields, LOG_LEVELS } from './observability/logger';
export type { RunConfig } from './config';
export { getRunConfig, loadRunConfig, resetRunConfig } from './config';
