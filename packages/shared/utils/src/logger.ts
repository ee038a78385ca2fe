/**
 * Component logger.
 *
 * Lines are printed as `[component] LEVEL: message ...args` and filtered by
 * a process-wide minimum level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

const envLevel = process.env.LOG_LEVEL;
let globalLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

export class ConsoleLogger implements Logger {
  constructor(
    private readonly component: string,
    private readonly level?: LogLevel
  ) {}

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level ?? globalLevel];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) console.debug(`[${this.component}] DEBUG:`, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) console.log(`[${this.component}] INFO:`, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) console.warn(`[${this.component}] WARN:`, message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) console.error(`[${this.component}] ERROR:`, message, ...args);
  }
}

export function createLogger(component: string, level?: LogLevel): Logger {
  return new ConsoleLogger(component, level);
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
