/**
 * Component-tagged console logger.
 *
 * Everything goes to stderr so that stdout stays clean for query output and
 * `--json` payloads.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  /** Same sink and level, tagged with another component name */
  child(component: string): Logger;
}

export type LogSink = (line: string) => void;

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function formatLogLine(level: Exclude<LogLevel, 'silent'>, component: string | undefined, msg: string, data?: LogData): string {
  const tag = component ? ` [${component}]` : '';
  const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
  return `[${level.toUpperCase()}]${tag} ${msg}${suffix}`;
}

export function createConsoleLogger(
  level: LogLevel = 'info',
  component?: string,
  sink: LogSink = (line) => console.error(line),
): Logger {
  const emit = (at: Exclude<LogLevel, 'silent'>, msg: string, data?: LogData): void => {
    if (RANK[at] < RANK[level]) return;
    sink(formatLogLine(at, component, msg, data));
  };

  return {
    debug: (msg, data) => emit('debug', msg, data),
    info: (msg, data) => emit('info', msg, data),
    warn: (msg, data) => emit('warn', msg, data),
    error: (msg, data) => emit('error', msg, data),
    child: (name) => createConsoleLogger(level, name, sink),
  };
}

export const silentLogger: Logger = createConsoleLogger('silent');
