/**
 * Structured logging: one JSON object per line.
 * info/warn go to stdout, error to stderr. LOG_LEVEL=silent mutes everything.
 */
import { config } from '../config';

export type LogLevel = 'info' | 'warn' | 'error';

export interface LogPayload {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 };

function enabled(level: LogLevel): boolean {
  const threshold = config.logLevel;
  if (threshold === 'silent') return false;
  if (threshold === 'warn' || threshold === 'error') {
    return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
  }
  return true;
}

function emit(level: LogLevel, message: string, context: Record<string, unknown>) {
  if (!enabled(level)) return;
  const payload: LogPayload = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context
  };
  const out = JSON.stringify(payload);
  if (level === 'error') {
    process.stderr.write(out + '\n');
  } else {
    process.stdout.write(out + '\n');
  }
}

export interface Logger {
  info(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  error(message: string, extra?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

export function createLogger(context: Record<string, unknown> = {}): Logger {
  return {
    info: (message, extra) => emit('info', message, { ...context, ...extra }),
    warn: (message, extra) => emit('warn', message, { ...context, ...extra }),
    error: (message, extra) => emit('error', message, { ...context, ...extra }),
    child: (more) => createLogger({ ...context, ...more })
  };
}

export const logger = createLogger();
