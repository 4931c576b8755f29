export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

const envLevel = process.env.LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function prefix(level: LogLevel): string {
  return `${new Date().toISOString()} | ${level.toUpperCase()} |`;
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (enabled('debug')) console.debug(prefix('debug'), ...args);
  },
  info: (...args: unknown[]) => {
    if (enabled('info')) console.log(prefix('info'), ...args);
  },
  warn: (...args: unknown[]) => {
    if (enabled('warn')) console.warn(prefix('warn'), ...args);
  },
  error: (...args: unknown[]) => {
    if (enabled('error')) console.error(prefix('error'), ...args);
  },
};
