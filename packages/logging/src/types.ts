/**
 * Logging types and interfaces for structured logging
 */

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT'] as const;
export type LogLevelString = (typeof LOG_LEVELS)[number];

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export const LOG_FORMATS = ['json', 'text'] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export type LogData = Readonly<Record<string, unknown>>;

export interface LogEntry {
  readonly timestamp: Date;
  readonly level: LogLevel;
  readonly component: string;
  readonly message: string;
  readonly data?: LogData;
  readonly error?: Error;
}

export interface LogTransport {
  readonly name: string;
  log(entry: LogEntry): Promise<void>;
  close?(): Promise<void>;
}

export interface LoggerConfig {
  readonly level: LogLevel | LogLevelString;
  readonly component: string;
  readonly transports?: LogTransport[];
  /** Fields merged into the data of every entry this logger writes */
  readonly bindings?: LogData;
}

export interface ConsoleTransportConfig {
  readonly format?: LogFormat;
  readonly colors?: boolean;
}

export interface MemoryTransportConfig {
  /** Oldest entries are dropped once this many are held */
  readonly maxEntries?: number;
}

export const isLogLevel = (value: string): value is LogLevelString =>
  (LOG_LEVELS as readonly string[]).includes(value);

export const isLogFormat = (value: string): value is LogFormat =>
  (LOG_FORMATS as readonly string[]).includes(value);
