/* src/log/logger.ts
 * Leveled console logger. Lines are prefixed "bexec:" (and "[scope]");
 * warn/error go to stderr, everything else to stdout.
 * Level: explicit option > BATCH_LOG_LEVEL > BATCH_DEBUG=1 (debug) > info.
 */
import { paint } from '@/util/color';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = {
  level: LogLevel;
  readonly scope?: string;
  trace: (msg: string) => void;
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

/** Line writer; receives the fully formatted line. */
export type LogWrite = (level: LogLevel, line: string) => void;

export type LoggerOptions = {
  scope?: string;
  level?: LogLevel;
  write?: LogWrite;
};

export const isLogLevel = (v: unknown): v is LogLevel =>
  typeof v === 'string' && LOG_LEVELS.some((l) => l === v);

export const resolveLogLevel = (explicit?: LogLevel): LogLevel => {
  if (explicit) return explicit;
  const env = (process.env.BATCH_LOG_LEVEL ?? '').trim().toLowerCase();
  if (isLogLevel(env)) return env;
  return process.env.BATCH_DEBUG === '1' ? 'debug' : 'info';
};

const consoleWrite: LogWrite = (level, line) => {
  switch (level) {
    case 'error':
      console.error(paint('error', line));
      return;
    case 'warn':
      console.error(paint('warn', line));
      return;
    case 'trace':
    case 'debug':
      console.log(paint('muted', line));
      return;
    default:
      console.log(line);
  }
};

export const createLogger = (opts: LoggerOptions = {}): Logger => {
  const write = opts.write ?? consoleWrite;
  const prefix = opts.scope ? `bexec: [${opts.scope}]` : 'bexec:';

  const logger: Logger = {
    level: resolveLogLevel(opts.level),
    scope: opts.scope,
    trace: (msg) => emit('trace', msg),
    debug: (msg) => emit('debug', msg),
    info: (msg) => emit('info', msg),
    warn: (msg) => emit('warn', msg),
    error: (msg) => emit('error', msg),
  };

  function emit(level: LogLevel, msg: string): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(logger.level)) return;
    write(level, `${prefix} ${msg}`);
  }

  return logger;
};
