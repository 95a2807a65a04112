// Tagged console logging. Every line carries an ISO timestamp and the
// component tag ([producer], [consumer], ...) so interleaved loop output
// stays readable.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

const envLevel = process.env.LOG_LEVEL || '';
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function createLogger(tag: string): Logger {
  const prefix = () => `${new Date().toISOString()} [${tag}]`;
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];

  return {
    debug: (...args) => { if (enabled('debug')) console.debug(prefix(), ...args); },
    info: (...args) => { if (enabled('info')) console.log(prefix(), ...args); },
    warn: (...args) => { if (enabled('warn')) console.warn(prefix(), ...args); },
    error: (...args) => { if (enabled('error')) console.error(prefix(), ...args); },
  };
}
