export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown> | undefined;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: LogLevel = 'info';

export function formatLog(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()}: ${entry.message}`;
  if (entry.data) {
    return `${base} ${JSON.stringify(entry.data)}`;
  }
  return base;
}

function createLogEntry(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>
): LogEntry {
  return {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

/**
 * Set the lowest level that is written out.
 */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

export const logger = {
  debug(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('debug')) {
      console.debug(formatLog(createLogEntry('debug', message, data)));
    }
  },

  info(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('info')) {
      console.info(formatLog(createLogEntry('info', message, data)));
    }
  },

  warn(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('warn')) {
      console.warn(formatLog(createLogEntry('warn', message, data)));
    }
  },

  error(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('error')) {
      console.error(formatLog(createLogEntry('error', message, data)));
    }
  },
};
