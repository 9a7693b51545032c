const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };
export type LogLevel = keyof typeof LEVELS;

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export const createLogger = (level: string, scope = 'Recorder'): Logger => {
  const currentLevel = isLogLevel(level) ? LEVELS[level] : LEVELS.info;

  const log = (name: string, message: string, meta?: unknown) => {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${scope}] [${name.toUpperCase()}]`;
    const write = name === 'error' ? console.error : console.log;

    if (meta !== undefined) {
      write(`${prefix} ${message}`, meta);
    } else {
      write(`${prefix} ${message}`);
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

export const silentLogger: Logger = createLogger('silent');
