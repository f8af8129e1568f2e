import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogFields = Record<string, string | number | boolean | null | undefined>;

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function timestamp(): string {
  return new Date().toISOString().slice(11, 23);
}

/** Renders fields as `key=value` pairs, skipping undefined ones */
export function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    parts.push(`${key}=${value}`);
  }
  return parts.length > 0 ? ' ' + parts.join(' ') : '';
}

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

function createLogger(scope?: string): Logger {
  const prefix = scope ? `[${scope}] ` : '';

  const write = (level: Exclude<LogLevel, 'silent'>, label: string, paint: (s: string) => string) =>
    (msg: string, fields?: LogFields): void => {
      if (!shouldLog(level)) return;
      console.error(paint(`[${timestamp()}] ${label} ${prefix}${msg}${formatFields(fields)}`));
    };

  return {
    debug: write('debug', 'DEBUG', chalk.gray),
    info: write('info', 'INFO ', chalk.blue),
    warn: write('warn', 'WARN ', chalk.yellow),
    error: write('error', 'ERROR', chalk.red),
    child(childScope: string): Logger {
      return createLogger(scope ? `${scope}:${childScope}` : childScope);
    },
  };
}

export const logger: Logger = createLogger();
