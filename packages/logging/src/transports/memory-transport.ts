import { LogEntry, LogLevel, LogTransport } from '../types.js';

/**
 * Keeps entries in memory, newest last. Used by tests and diagnostics dumps.
 */
export class MemoryTransport implements LogTransport {
  public readonly name = 'memory';
  private readonly entries: LogEntry[] = [];

  constructor(private readonly capacity: number = 1000) {}

  async log(entry: LogEntry): Promise<void> {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }
  }

  getEntries(level?: LogLevel): readonly LogEntry[] {
    return level === undefined ? [...this.entries] : this.entries.filter(e => e.level === level);
  }

  getMessages(level?: LogLevel): string[] {
    return this.getEntries(level).map(e => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }

  async close(): Promise<void> {
    this.clear();
  }
}
