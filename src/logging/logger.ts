import pc from 'picocolors';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  name: string;
  level?: LogLevel;
  write?: LogSink;
  color?: boolean;
  /** Clock used for the timestamp prefix. */
  now?: () => Date;
}

export interface Logger {
  readonly name: string;
  readonly level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  child(name: string): Logger;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function timestamp(date: Date): string {
  return `${pad(date.getHours(), 2)}:${pad(date.getMinutes(), 2)}:${pad(date.getSeconds(), 2)}.${pad(date.getMilliseconds(), 3)}`;
}

export function createLogger(options: LoggerOptions): Logger {
  const { name, level = 'info', write = process.stderr, color = false, now = () => new Date() } = options;
  const threshold = LOG_LEVELS.indexOf(level);
  const c = pc.createColors(color);
  const tags: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
    error: c.red,
    warn: c.yellow,
    info: c.cyan,
    debug: c.dim,
  };

  const emit = (lvl: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (LOG_LEVELS.indexOf(lvl) > threshold) return;
    const tag = lvl.toUpperCase().padEnd(5);
    write.write(`${timestamp(now())} ${tags[lvl](tag)} [${name}] ${message}\n`);
  };

  return {
    name,
    level,
    error: (message) => emit('error', message),
    warn: (message) => emit('warn', message),
    info: (message) => emit('info', message),
    debug: (message) => emit('debug', message),
    child: (childName) => createLogger({ ...options, name: `${name}:${childName}` }),
  };
}

export const nullLogger: Logger = createLogger({
  name: 'null',
  level: 'silent',
  write: { write: () => true },
});
