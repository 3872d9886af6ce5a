export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Logger callback for diagnostic events. */
export type Logger = (level: LogLevel, message: string, data?: unknown) => void;
