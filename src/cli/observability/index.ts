/**
 * Observability: per-dependency log files
 */

export {
  appendToLog,
  createLogger,
  DependencyLogs,
  getLogPath,
  type LogOptions,
  makeLogOptions,
} from './logger.ts';
