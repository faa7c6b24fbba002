/**
 * Logging utility for the fleet-membership components
 * Provides leveled, component-prefixed console logging
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export interface LoggingConfig {
  level?: LogLevel;
  component?: string;
  enableTestMode?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

export class MembershipLogger implements Logger {
  private readonly level: LogLevel;
  private readonly testMode: boolean;

  constructor(private readonly config: LoggingConfig = {}) {
    this.level = config.level ?? 'info';
    // Auto-detect test mode if not explicitly set
    this.testMode = config.enableTestMode
      ?? (process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) {
      console.log(`${this.prefix('INFO')} ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(`${this.prefix('WARN')} ${message}`, ...args);
    }
  }

  /**
   * Log error messages (always shown unless in test mode)
   */
  error(message: string, ...args: unknown[]): void {
    if (!this.testMode) {
      console.error(`${this.prefix('ERROR')} ${message}`, ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(`${this.prefix('DEBUG')} ${message}`, ...args);
    }
  }

  /**
   * Derive a logger for a sub-component sharing this logger's settings
   */
  child(component: string): MembershipLogger {
    const name = this.config.component ? `${this.config.component}:${component}` : component;
    return new MembershipLogger({ ...this.config, component: name, enableTestMode: this.testMode });
  }

  private enabled(level: LogLevel): boolean {
    return !this.testMode && LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private prefix(tag: string): string {
    return this.config.component ? `[${tag}] [${this.config.component}]` : `[${tag}]`;
  }
}

/**
 * Create a logger instance with the given configuration
 */
export function createLogger(config: LoggingConfig = {}): MembershipLogger {
  return new MembershipLogger(config);
}
