export {
  consoleLogger,
  silentLogger,
  createEntryLogger,
  createLevelLogger,
  createCapturingLogger,
  formatLogLine,
  LOG_THRESHOLDS,
  type EstimatorLogger,
  type LogLevel,
  type LogThreshold,
  type LogEntry,
} from './logger.js';
