import { ConsoleTransport } from './transports/console-transport.js';
import { LogData, LogEntry, LogLevel, LogTransport, LoggerConfig } from './types.js';

/**
 * Structured logger with multiple transport support
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string;
  private readonly bindings: LogData | undefined;
  private readonly transports: LogTransport[];

  constructor(config: LoggerConfig) {
    this.component = config.component;
    this.level = typeof config.level === 'string' ? Logger.parseLevel(config.level) : config.level;
    this.bindings = config.bindings;
    this.transports = config.transports || [new ConsoleTransport()];
  }

  /**
   * Create a child logger for a sub-component, optionally binding extra fields
   */
  child(component: string, bindings?: LogData): Logger {
    return new Logger({
      level: this.level,
      component: `${this.component}:${component}`,
      transports: this.transports,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  debug(message: string, data?: LogData): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: LogData): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: LogData): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown, data?: LogData): void {
    this.log(LogLevel.ERROR, message, data, error instanceof Error ? error : undefined);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  setLevel(level: LogLevel | string): void {
    this.level = typeof level === 'string' ? Logger.parseLevel(level) : level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Close all transports
   */
  async close(): Promise<void> {
    await Promise.all(this.transports.map(t => t.close?.()));
  }

  private log(level: LogLevel, message: string, data?: LogData, error?: Error): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const merged = this.bindings ? { ...this.bindings, ...data } : data;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      component: this.component,
      message,
      ...(merged && { data: merged }),
      ...(error && { error }),
    };

    this.transports.forEach(transport => {
      transport.log(entry).catch(err => {
        // eslint-disable-next-line no-console
        console.error(`Transport ${transport.name} failed:`, err);
      });
    });
  }

  static parseLevel(level: string): LogLevel {
    switch (level.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'INFO':
        return LogLevel.INFO;
      case 'WARN':
      case 'WARNING':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        throw new Error(`Invalid log level: ${level}`);
    }
  }
}
