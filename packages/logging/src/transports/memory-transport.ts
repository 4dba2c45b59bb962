import type { LogEntry, LogLevel, LogTransport, MemoryTransportConfig } from '../types.js';

/**
 * Keeps log entries in memory, newest last.
 *
 * Used to inspect what a component logged (tests, diagnostics endpoints).
 */
export class MemoryTransport implements LogTransport {
  public readonly name = 'memory';
  private readonly maxEntries: number;
  private readonly buffer: LogEntry[] = [];

  constructor(config: MemoryTransportConfig = {}) {
    this.maxEntries = config.maxEntries ?? 1000;
  }

  async log(entry: LogEntry): Promise<void> {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxEntries) {
      this.buffer.splice(0, this.buffer.length - this.maxEntries);
    }
  }

  get entries(): readonly LogEntry[] {
    return this.buffer;
  }

  messages(level?: LogLevel): string[] {
    return this.buffer.filter(e => level === undefined || e.level === level).map(e => e.message);
  }

  clear(): void {
    this.buffer.length = 0;
  }
}
