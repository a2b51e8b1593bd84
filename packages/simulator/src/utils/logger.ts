type LogLevel = 'debug' | 'info' | 'warn' | 'error';

function formatLog(level: LogLevel, message: string, data?: Record<string, unknown>): string {
  const base = `[${new Date().toISOString()}] ${level.toUpperCase()}: ${message}`;
  if (data) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

export const logger = {
  debug(message: string, data?: Record<string, unknown>): void {
    console.debug(formatLog('debug', message, data));
  },

  info(message: string, data?: Record<string, unknown>): void {
    console.info(formatLog('info', message, data));
  },

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(formatLog('warn', message, data));
  },

  error(message: string, data?: Record<string, unknown>): void {
    console.error(formatLog('error', message, data));
  },
};
