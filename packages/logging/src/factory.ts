import { Logger } from './logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { MemoryTransport } from './transports/memory-transport.js';
import { LogLevel } from './types.js';

/**
 * Factory for creating loggers with common configurations
 */
export class LoggerFactory {
  /**
   * Human-readable console output, colored
   */
  static createConsoleLogger(component: string, level: LogLevel | string = LogLevel.INFO): Logger {
    return new Logger({
      component,
      level: typeof level === 'string' ? Logger.parseLevel(level) : level,
      transports: [new ConsoleTransport({ format: 'text', colors: true })],
    });
  }

  /**
   * One JSON object per line, for log shippers
   */
  static createStructuredLogger(
    component: string,
    level: LogLevel | string = LogLevel.INFO
  ): Logger {
    return new Logger({
      component,
      level: typeof level === 'string' ? Logger.parseLevel(level) : level,
      transports: [new ConsoleTransport({ format: 'json', colors: false })],
    });
  }

  /**
   * Logger that records everything in memory; returns the transport for inspection
   */
  static createMemoryLogger(
    component: string,
    level: LogLevel | string = LogLevel.DEBUG
  ): { logger: Logger; transport: MemoryTransport } {
    const transport = new MemoryTransport();
    const logger = new Logger({
      component,
      level: typeof level === 'string' ? Logger.parseLevel(level) : level,
      transports: [transport],
    });
    return { logger, transport };
  }

  /**
   * Logger that drops every entry
   */
  static createSilentLogger(component = 'silent'): Logger {
    return new Logger({ component, level: LogLevel.ERROR, transports: [] });
  }
}
