import type { LogLevel } from '../types/config.js';
import { isoNow } from './clock.js';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Prefix for every line, e.g. the component name */
  name?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const prefix = options.name ? ` [${options.name}]` : '';

  const write = (level: LogLevel, message: string) => {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = `${isoNow()} ${level.toUpperCase()}${prefix} ${message}`;
    // stderr only; stdout carries command output
    console.error(line);
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
