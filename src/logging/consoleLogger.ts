import type { Logger, LogLevel } from '../types/logger.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Logger writing `[name] LEVEL message` lines to the console, dropping levels below `minLevel`. */
export function createConsoleLogger(minLevel: LogLevel = 'info', name = 'echo-agent'): Logger {
  return (level, message, data) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

    const line = `[${name}] ${level.toUpperCase()} ${message}`;
    const write =
      level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;

    if (data === undefined) {
      write(line);
    } else {
      write(line, data);
    }
  };
}
