import { getLogLevel, type LogLevel } from '../config.js';

type LogData = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  NONE: 4
};

function shouldLog(level: Exclude<LogLevel, 'NONE'>): boolean {
  return LEVELS[level] >= LEVELS[getLogLevel()];
}

function format(level: string, message: string, scope?: string): string {
  return scope ? `[${level}] [${scope}] ${message}` : `[${level}] ${message}`;
}

function emit(write: (...args: unknown[]) => void, line: string, data?: LogData): void {
  if (data && Object.keys(data).length > 0) {
    write(line, data);
  } else {
    write(line);
  }
}

export const logger = {
  debug: (message: string, data?: LogData, scope?: string) => {
    if (shouldLog('DEBUG')) {
      emit(console.log, format('DEBUG', message, scope), data);
    }
  },

  info: (message: string, data?: LogData, scope?: string) => {
    if (shouldLog('INFO')) {
      emit(console.log, format('INFO', message, scope), data);
    }
  },

  warn: (message: string, data?: LogData, scope?: string) => {
    if (shouldLog('WARN')) {
      emit(console.warn, format('WARN', message, scope), data);
    }
  },

  error: (message: string, data?: LogData, scope?: string) => {
    if (shouldLog('ERROR')) {
      emit(console.error, format('ERROR', message, scope), data);
    }
  }
};
