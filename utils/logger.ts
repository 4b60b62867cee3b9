// Basic logger implementation

const getTimestamp = (): string => {
  return new Date().toISOString();
};

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

// Valid levels: 'trace', 'debug', 'info', 'warn', 'error'
// Default to 'error' in test environment, 'info' otherwise
const getDefaultLogLevel = (): LogLevel => {
  if (process.env.NODE_ENV === 'test') {
    return 'error';
  }
  return 'info';
};

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHTS;
}

const requestedLevel = process.env.LOG_LEVEL?.toLowerCase() ?? '';
const LOG_LEVEL: LogLevel = isLogLevel(requestedLevel) ? requestedLevel : getDefaultLogLevel();
const CURRENT_LEVEL_WEIGHT = LEVEL_WEIGHTS[LOG_LEVEL];

export interface Logger {
  trace: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export const logger: Logger = {
  trace: (...args: unknown[]): void => {
    if (CURRENT_LEVEL_WEIGHT <= LEVEL_WEIGHTS.trace) {
      console.debug(`[${getTimestamp()}] [TRACE]`, ...args); // Use console.debug for trace
    }
  },
  debug: (...args: unknown[]): void => {
    if (CURRENT_LEVEL_WEIGHT <= LEVEL_WEIGHTS.debug) {
      console.debug(`[${getTimestamp()}] [DEBUG]`, ...args);
    }
  },
  info: (...args: unknown[]): void => {
    if (CURRENT_LEVEL_WEIGHT <= LEVEL_WEIGHTS.info) {
      console.info(`[${getTimestamp()}] [INFO]`, ...args);
    }
  },
  warn: (...args: unknown[]): void => {
    if (CURRENT_LEVEL_WEIGHT <= LEVEL_WEIGHTS.warn) {
      console.warn(`[${getTimestamp()}] [WARN]`, ...args);
    }
  },
  error: (...args: unknown[]): void => {
    if (CURRENT_LEVEL_WEIGHT <= LEVEL_WEIGHTS.error) {
      console.error(`[${getTimestamp()}] [ERROR]`, ...args);
    }
  },
};
