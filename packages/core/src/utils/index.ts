/**
 * Utility exports
 */
export {
  createLogger,
  silentLogger,
  getLogAggregator,
  setLogAggregator,
  LogLevel,
  DEFAULT_LOG_CAPACITY,
  type Logger,
  type LoggerOptions,
  type LogEntry,
  type LogAggregator,
} from './logger.js'
