import type { Logger } from './types';

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };
export type LogLevel = keyof typeof LEVELS;

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export const createLogger = (level: string = process.env.MOCK_LMU_LOG_LEVEL || 'info'): Logger => {
  const currentLevel = isLogLevel(level) ? LEVELS[level] : LEVELS.info;

  const log = (name: string, message: string, meta?: unknown) => {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [Mock:LMU] [${name.toUpperCase()}]`;

    if (meta) {
      console.log(`${prefix} ${message}`, meta);
    } else {
      console.log(`${prefix} ${message}`);
    }
  };

  return {
    debug: (message, meta) => {
      if (currentLevel <= LEVELS.debug) log('debug', message, meta);
    },
    info: (message, meta) => {
      if (currentLevel <= LEVELS.info) log('info', message, meta);
    },
    warn: (message, meta) => {
      if (currentLevel <= LEVELS.warn) log('warn', message, meta);
    },
    error: (message, meta) => {
      if (currentLevel <= LEVELS.error) log('error', message, meta);
    },
  };
};
