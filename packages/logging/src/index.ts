/**
 * Structured logging for the retry-quota packages
 *
 * - Text and JSON console output
 * - In-memory transport for inspecting what was logged
 * - Child loggers with bound fields (operation name, correlation id)
 */

export { Logger } from './logger.js';
export { LoggerFactory, type LoggingSettings } from './factory.js';

export { LogLevel, LOG_LEVELS, LOG_FORMATS, isLogLevel, isLogFormat } from './types.js';

export type {
  LogData,
  LogEntry,
  LogFormat,
  LogLevelString,
  LogTransport,
  LoggerConfig,
  ConsoleTransportConfig,
  MemoryTransportConfig,
} from './types.js';

export { ConsoleTransport, formatJson, formatText } from './transports/console-transport.js';
export { MemoryTransport } from './transports/memory-transport.js';
