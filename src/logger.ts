export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

// Reads process.env, not config.ts: importing config exits the process on an
// invalid environment. config.ts checks LOG_LEVEL against LOG_LEVELS at start-up.
function activeLevel(): LogLevel {
  const level = process.env.LOG_LEVEL;
  return isLogLevel(level) ? level : 'info';
}

export function createLogger(tag: string): Logger {
  const write = (level: LogLevel, message: string, data?: unknown): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel()]) return;

    const line = `[${tag}] ${message}`;
    const args: unknown[] = data === undefined ? [line] : [line, data];

    if (level === 'error') {
      console.error(...args);
    } else if (level === 'warn') {
      console.warn(...args);
    } else {
      console.log(...args);
    }
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}
