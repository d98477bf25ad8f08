import { LoggingConfig, LogLevel } from '../types/config';
import { ConfigurationError } from '../errors/errors';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private enabled: boolean;
  private level: LogLevel;
  private prefix: string;
  private component?: string;

  constructor(config: LoggingConfig = {}, component?: string) {
    this.enabled = config.enabled !== false;
    this.level = config.level || 'info';
    this.prefix = config.prefix || '[QueueWatch]';
    this.component = component;

    if (!(this.level in LEVEL_PRIORITY)) {
      throw new ConfigurationError(`unknown log level: ${String(this.level)}`);
    }
  }

  /**
   * A logger for one part of the system. Shares this logger's settings and
   * tags every line with the component name, e.g. "[QueueWatch] Monitor:".
   * Nested components are joined with a dot.
   */
  child(component: string): Logger {
    return new Logger(
      { enabled: this.enabled, level: this.level, prefix: this.prefix },
      this.component ? `${this.component}.${component}` : component
    );
  }

  isLevelEnabled(level: LogLevel): boolean {
    if (!this.enabled) return false;
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    const tag = this.component ? `${this.prefix} ${this.component}:` : this.prefix;
    return `${timestamp} ${tag} ${levelStr} ${message}`;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled('debug')) {
      console.debug(this.formatMessage('debug', message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled('info')) {
      console.info(this.formatMessage('info', message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled('warn')) {
      console.warn(this.formatMessage('warn', message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled('error')) {
      console.error(this.formatMessage('error', message), ...args);
    }
  }
}
