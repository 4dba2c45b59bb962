import { Logger } from './logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { MemoryTransport } from './transports/memory-transport.js';
import { type LogFormat, LogLevel, type LogLevelString, isLogLevel } from './types.js';

const normalizeLogLevel = (level: LogLevel | string): LogLevel | LogLevelString => {
  if (typeof level === 'string') {
    const upper = level.toUpperCase();
    return isLogLevel(upper) ? upper : Logger.parseLogLevel(level);
  }
  return level;
};

/**
 * Logging settings as they appear in a settings file
 */
export interface LoggingSettings {
  readonly level: LogLevelString;
  readonly format: LogFormat;
  readonly colors?: boolean;
}

/**
 * Factory for creating loggers with common configurations
 */
export class LoggerFactory {
  /**
   * Create a logger with console transport only
   */
  static createConsoleLogger(component: string, level: LogLevel | string = LogLevel.INFO): Logger {
    return new Logger({
      component,
      level: normalizeLogLevel(level),
      transports: [new ConsoleTransport({ format: 'text', colors: true })],
    });
  }

  /**
   * Create a logger that drops everything; the default when a caller passes none
   */
  static createSilentLogger(component: string): Logger {
    return new Logger({ component, level: LogLevel.SILENT, transports: [] });
  }

  /**
   * Create a logger that records into a memory transport, returned alongside it
   */
  static createMemoryLogger(
    component: string,
    level: LogLevel | string = LogLevel.DEBUG
  ): { logger: Logger; transport: MemoryTransport } {
    const transport = new MemoryTransport();
    const logger = new Logger({
      component,
      level: normalizeLogLevel(level),
      transports: [transport],
    });
    return { logger, transport };
  }

  /**
   * Create a console logger from the `logging:` section of a settings file
   */
  static fromSettings(component: string, settings: LoggingSettings): Logger {
    return new Logger({
      component,
      level: settings.level,
      transports: [
        new ConsoleTransport({
          format: settings.format,
          colors: settings.format === 'text' && (settings.colors ?? true),
        }),
      ],
    });
  }
}
