import winston from 'winston';
import { pino } from 'pino';

export type LoggerBackend = 'winston' | 'pino';

const SERVICE_NAME = 'upnp-didl-lite';

// Custom log levels for Winston: error < warn < info < debug < trace
// Note: Winston uses ascending numbers for less important levels
const customLevels = {
  levels: {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
    trace: 4    // Most verbose - matches Pino's trace level
  },
  colors: {
    error: 'red',
    warn: 'yellow',
    info: 'green',
    debug: 'blue',
    trace: 'gray'
  }
};

// Logger interface that works with both Winston and Pino
export interface Logger {
  error: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  debug: (message: string, ...args: unknown[]) => void;
  trace: (message: string, ...args: unknown[]) => void;
  level: string;
}

export interface LoggerOptions {
  backend: LoggerBackend;
  level: string;
  /** Colorized single-line output instead of JSON */
  development: boolean;
}

export function isLoggerBackend(value: string): value is LoggerBackend {
  return value === 'winston' || value === 'pino';
}

export function isDevelopmentEnv(nodeEnv: string | undefined): boolean {
  return !nodeEnv || nodeEnv === 'development';
}

/**
 * Winston in development, Pino otherwise, unless LOGGER names one
 */
export function loggerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const development = isDevelopmentEnv(env.NODE_ENV);
  const requested = env.LOGGER?.toLowerCase();
  return {
    backend: requested && isLoggerBackend(requested) ? requested : development ? 'winston' : 'pino',
    level: env.LOG_LEVEL || env.DEBUG_LEVEL || 'info',
    development
  };
}

function createWinstonLogger(options: LoggerOptions): Logger {
  winston.addColors(customLevels.colors);

  const winstonLogger = winston.createLogger({
    levels: customLevels.levels,
    level: options.level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true })
    ),
    defaultMeta: { service: SERVICE_NAME },
    transports: [
      new winston.transports.Console({
        format: options.development
          ? winston.format.combine(winston.format.colorize(), winston.format.simple())
          : winston.format.json()
      })
    ]
  });

  return {
    error: (message: string, ...args: unknown[]) => winstonLogger.error(message, ...args),
    warn: (message: string, ...args: unknown[]) => winstonLogger.warn(message, ...args),
    info: (message: string, ...args: unknown[]) => winstonLogger.info(message, ...args),
    debug: (message: string, ...args: unknown[]) => winstonLogger.debug(message, ...args),
    // trace is a custom level, so it goes through the generic log() entry point
    trace: (message: string, ...args: unknown[]) => winstonLogger.log('trace', message, ...args),
    get level() { return winstonLogger.level; },
    set level(level: string) { winstonLogger.level = level; }
  };
}

function createPinoLogger(options: LoggerOptions): Logger {
  const pinoLogger = pino({
    level: options.level,
    base: { service: SERVICE_NAME },
    messageKey: 'message',
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => ({ level: label })
    }
  });

  // Pino takes metadata first
  const write = (method: 'error' | 'warn' | 'info' | 'debug' | 'trace') =>
    (message: string, ...args: unknown[]): void => {
      const [meta] = args;
      if (typeof meta === 'object' && meta !== null) {
        pinoLogger[method](meta, message);
      } else {
        pinoLogger[method](message, meta);
      }
    };

  return {
    error: write('error'),
    warn: write('warn'),
    info: write('info'),
    debug: write('debug'),
    trace: write('trace'),
    get level() { return pinoLogger.level; },
    set level(level: string) { pinoLogger.level = level; }
  };
}

export function createLogger(options: LoggerOptions): Logger {
  return options.backend === 'winston' ? createWinstonLogger(options) : createPinoLogger(options);
}

let activeOptions = loggerOptionsFromEnv();
let active = createLogger(activeOptions);

/**
 * Swap the backend behind the shared logger. The level carries over unless
 * a new one is given.
 */
export function reconfigureLogger(changes: Partial<LoggerOptions>): void {
  const next: LoggerOptions = { ...activeOptions, level: active.level, ...changes };
  if (next.backend !== activeOptions.backend || next.development !== activeOptions.development) {
    active = createLogger(next);
  } else {
    active.level = next.level;
  }
  activeOptions = next;
}

export function currentLoggerBackend(): LoggerBackend {
  return activeOptions.backend;
}

// Stable handle; modules keep this reference across reconfiguration
const logger: Logger = {
  error: (message: string, ...args: unknown[]) => active.error(message, ...args),
  warn: (message: string, ...args: unknown[]) => active.warn(message, ...args),
  info: (message: string, ...args: unknown[]) => active.info(message, ...args),
  debug: (message: string, ...args: unknown[]) => active.debug(message, ...args),
  trace: (message: string, ...args: unknown[]) => active.trace(message, ...args),
  get level() { return active.level; },
  set level(level: string) {
    active.level = level;
    activeOptions = { ...activeOptions, level };
  }
};

export default logger;
