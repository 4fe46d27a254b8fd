import process from 'node:process';

type LogMethod = (message: string, ...args: unknown[]) => void;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHT;
}

function parseBooleanEnv(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (parseBooleanEnv(env.DETFETCH_DEBUG)) {
    return 'debug';
  }

  const configured = env.DETFETCH_LOG_LEVEL?.trim().toLowerCase();
  if (configured) {
    if (configured === 'trace' || configured === 'verbose') {
      return 'debug';
    }
    if (configured === 'silent') {
      return 'error';
    }
    if (isLogLevel(configured)) {
      return configured;
    }
  }

  return 'info';
}

const LOG_LEVEL_THRESHOLD = resolveLogLevel();

function shouldLog(level: LogLevel): boolean {
  return LEVEL_WEIGHT[level] <= LEVEL_WEIGHT[LOG_LEVEL_THRESHOLD];
}

export interface DetfetchLogger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

export function createLogger(namespace: string): DetfetchLogger {
  const prefix = `[${namespace}]`;

  const wrap = (level: LogLevel): LogMethod => {
    return (message: string, ...args: unknown[]) => {
      if (!shouldLog(level)) {
        return;
      }
      console[level](`${prefix} ${message}`, ...args);
    };
  };

  return {
    debug: wrap('debug'),
    info: wrap('info'),
    warn: wrap('warn'),
    error: wrap('error'),
  };
}
