import { ConsoleTransport } from './transports/console-transport.js';
import {
  type LogData,
  type LogEntry,
  LogLevel,
  type LogTransport,
  type LoggerConfig,
} from './types.js';

/**
 * Structured logger with multiple transport support
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string;
  private transports: LogTransport[];
  private readonly bindings: LogData | undefined;

  constructor(config: LoggerConfig) {
    this.component = config.component;
    this.level = typeof config.level === 'string' ? Logger.parseLogLevel(config.level) : config.level;
    this.transports = config.transports || [new ConsoleTransport()];
    this.bindings = config.bindings;
  }

  /**
   * Create a child logger for a sub-component, sharing level and transports
   */
  child(component: string, bindings?: LogData): Logger {
    const merged = this.bindings || bindings ? { ...this.bindings, ...bindings } : undefined;
    return new Logger({
      level: this.level,
      component: `${this.component}:${component}`,
      transports: this.transports,
      ...(merged && { bindings: merged }),
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
    const errorObj = error instanceof Error ? error : undefined;
    this.log(LogLevel.ERROR, message, data, errorObj);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level && this.level !== LogLevel.SILENT;
  }

  setLevel(level: LogLevel | string): void {
    this.level = typeof level === 'string' ? Logger.parseLogLevel(level) : level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  getComponent(): string {
    return this.component;
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  removeTransport(transportName: string): void {
    this.transports = this.transports.filter(t => t.name !== transportName);
  }

  async close(): Promise<void> {
    await Promise.all(
      this.transports
        .filter((t): t is LogTransport & { close: () => Promise<void> } => !!t.close)
        .map(t => t.close())
    );
  }

  private log(level: LogLevel, message: string, data?: LogData, error?: Error): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const merged = this.bindings || data ? { ...this.bindings, ...data } : undefined;
    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      component: this.component,
      message,
      ...(merged && { data: merged }),
      ...(error && { error }),
    };

    this.transports.forEach(transport => {
      transport.log(entry).catch((err: unknown) => {
        // eslint-disable-next-line no-console
        console.error(`Transport ${transport.name} failed:`, err);
      });
    });
  }

  static parseLogLevel(level: string): LogLevel {
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
      case 'SILENT':
      case 'OFF':
        return LogLevel.SILENT;
      default:
        throw new Error(`Invalid log level: ${level}`);
    }
  }
}
