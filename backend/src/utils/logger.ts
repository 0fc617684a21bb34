/**
 * Console-backed leveled logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogSink = Pick<Console, 'log' | 'warn' | 'error'>;

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(level: LogLevel = 'info', sink: LogSink = console, clock: () => Date = () => new Date()): Logger {
  const write = (messageLevel: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (SEVERITY[messageLevel] < SEVERITY[level]) {
      return;
    }

    const line = `${clock().toISOString()} - ${messageLevel.toUpperCase()} - ${message}`;
    if (messageLevel === 'error') {
      sink.error(line);
    } else if (messageLevel === 'warn') {
      sink.warn(line);
    } else {
      sink.log(line);
    }
  };

  return {
    debug: message => write('debug', message),
    info: message => write('info', message),
    warn: message => write('warn', message),
    error: message => write('error', message)
  };
}

export const silentLogger: Logger = createLogger('silent');
