import { formatJson, formatText } from '../format.js';
import { LogEntry, LogLevel, LogTransport, ConsoleTransportConfig } from '../types.js';

/**
 * Console transport for logging to stdout/stderr
 */
export class ConsoleTransport implements LogTransport {
  public readonly name = 'console';
  private config: Required<ConsoleTransportConfig>;

  constructor(config: ConsoleTransportConfig = {}) {
    this.config = {
      format: 'text',
      colors: true,
      ...config,
    };
  }

  async log(entry: LogEntry): Promise<void> {
    const output =
      this.config.format === 'json' ? formatJson(entry) : formatText(entry, this.config.colors);

    switch (entry.level) {
      case LogLevel.DEBUG:
        // eslint-disable-next-line no-console
        console.debug(output);
        break;
      case LogLevel.INFO:
        // eslint-disable-next-line no-console
        console.info(output);
        break;
      case LogLevel.WARN:
        // eslint-disable-next-line no-console
        console.warn(output);
        break;
      case LogLevel.ERROR:
        // eslint-disable-next-line no-console
        console.error(output);
        break;
      default:
        // eslint-disable-next-line no-console
        console.log(output);
    }
  }
}
