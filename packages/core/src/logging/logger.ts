/**
 * Logger - Leveled console logging shared by the kernel and the CLI
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export interface LoggerOptions {
  /** Lowest level that is written */
  level?: LogLevel;
  /** Prefix written before every message */
  prefix?: string;
  /** Destination, defaults to the console */
  sink?: Pick<Console, 'error' | 'warn' | 'info' | 'debug'>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const prefix = options.prefix ?? '[codeprobe]';
  const sink = options.sink ?? console;
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= threshold;

  return {
    error: (msg) => {
      if (enabled('error')) sink.error(`${prefix} ${msg}`);
    },
    warn: (msg) => {
      if (enabled('warn')) sink.warn(`${prefix} ${msg}`);
    },
    info: (msg) => {
      if (enabled('info')) sink.info(`${prefix} ${msg}`);
    },
    debug: (msg) => {
      if (enabled('debug')) sink.debug(`${prefix} DEBUG: ${msg}`);
    },
  };
}

/** Logger that drops every message */
export const silentLogger: Logger = createLogger({ level: 'silent' });
