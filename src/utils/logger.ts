import * as colors from 'colorette';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LogSink {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  useColor?: boolean;
  prefix?: string;
}

export function colorEnabled(): boolean {
  return process.stdout.isTTY === true && process.env.NO_COLOR !== '1';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const sink: LogSink = options.sink ?? console;
  const c = colors.createColors({ useColor: options.useColor ?? colorEnabled() });
  const prefix = options.prefix ? `${options.prefix} ` : '';

  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= threshold;

  return {
    debug: (msg: string) => {
      if (enabled('debug')) sink.log(c.dim(`🐛 ${prefix}${msg}`));
    },
    info: (msg: string) => {
      if (enabled('info')) sink.log(`${c.blue('ℹ️')}  ${prefix}${msg}`);
    },
    success: (msg: string) => {
      if (enabled('info')) sink.log(`${c.green('✅')} ${prefix}${msg}`);
    },
    warn: (msg: string) => {
      if (enabled('warn')) sink.warn(`${c.yellow('⚠️')}  ${prefix}${msg}`);
    },
    error: (msg: string) => {
      if (enabled('error')) sink.error(`${c.red('❌')} ${prefix}${msg}`);
    },
  };
}

export const defaultLogger: Logger = createLogger({ level: 'warn' });

/** Logger that drops everything; handy when warnings are collected elsewhere. */
export const silentLogger: Logger = createLogger({ level: 'silent' });
