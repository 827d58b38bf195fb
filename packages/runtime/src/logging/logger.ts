// Structured logging

/**
 * Structured logger interface.
 * Implementations can route to console, a stream, or a test buffer.
 */
export type EstimatorLogger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Minimum level to emit; 'silent' drops everything
 */
export type LogThreshold = LogLevel | 'silent';

export const LOG_THRESHOLDS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogThreshold[];

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
};

/**
 * Format a log line: "[LEVEL] message {json data}"
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>
): string {
  const prefix = `[${level.toUpperCase()}] ${message}`;
  return data === undefined ? prefix : `${prefix} ${JSON.stringify(data)}`;
}

/**
 * Create a logger that hands each entry at or above the threshold to `write`.
 * Every other logger here is built on this one.
 */
export function createEntryLogger(
  write: (entry: LogEntry) => void,
  threshold: LogThreshold = 'info'
): EstimatorLogger {
  const log = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) {
      return;
    }
    write(data === undefined ? { level, message } : { level, message, data });
  };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}

/**
 * Create a logger that writes formatted lines to a sink.
 *
 * @param sink - Receives one formatted line per entry (no trailing newline)
 * @param threshold - Minimum level to emit
 */
export function createLevelLogger(
  sink: (line: string) => void,
  threshold: LogThreshold = 'info'
): EstimatorLogger {
  return createEntryLogger(
    ({ level, message, data }) => sink(formatLogLine(level, message, data)),
    threshold
  );
}

// stderr, so stdout carries only results
export const consoleLogger: EstimatorLogger = createLevelLogger(
  (line) => console.error(line),
  'debug'
);

export const silentLogger: EstimatorLogger = createLevelLogger(() => {}, 'silent');

/**
 * Logger that keeps every entry, for assertions in tests
 */
export function createCapturingLogger(): EstimatorLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { entries, ...createEntryLogger((entry) => entries.push(entry), 'debug') };
}
