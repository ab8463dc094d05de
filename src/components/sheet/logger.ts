export type LogLevel = 'debug' | 'warn' | 'silent';

const ORDER: Record<LogLevel, number> = { debug: 0, warn: 1, silent: 2 };

let level: LogLevel = process.env.NODE_ENV === 'production' ? 'silent' : 'warn';

export function setLogLevel(next: LogLevel) {
  level = next;
}

export function getLogLevel(): LogLevel {
  return level;
}

const enabled = (at: LogLevel) => ORDER[at] >= ORDER[level];

export const logger = {
  debug(message: string, details?: Record<string, unknown>) {
    if (!enabled('debug')) return;
    if (details) console.debug(`[sheet] ${message}`, details);
    else console.debug(`[sheet] ${message}`);
  },
  warn(message: string, details?: Record<string, unknown>) {
    if (!enabled('warn')) return;
    if (details) console.warn(`[sheet] ${message}`, details);
    else console.warn(`[sheet] ${message}`);
  },
};
