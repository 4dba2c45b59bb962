import {
  type ConsoleTransportConfig,
  type LogEntry,
  LogLevel,
  type LogTransport,
} from '../types.js';

const LEVEL_COLORS: Readonly<Record<LogLevel, string>> = {
  [LogLevel.DEBUG]: '\x1b[36m', // Cyan
  [LogLevel.INFO]: '\x1b[32m', // Green
  [LogLevel.WARN]: '\x1b[33m', // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
  [LogLevel.SILENT]: '',
};

const RESET = '\x1b[0m';

/**
 * Render an entry as a single JSON line
 */
export function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    timestamp: entry.timestamp.toISOString(),
    level: LogLevel[entry.level],
    component: entry.component,
    message: entry.message,
    ...(entry.data && Object.keys(entry.data).length > 0 && { data: entry.data }),
    ...(entry.error && {
      error: {
        name: entry.error.name,
        message: entry.error.message,
        stack: entry.error.stack,
      },
    }),
  });
}

/**
 * Render an entry as `<timestamp> <LEVEL> [component] message {data}`
 */
export function formatText(entry: LogEntry, colors = false): string {
  const levelName = LogLevel[entry.level];
  const level = colors ? `${LEVEL_COLORS[entry.level]}${levelName}${RESET}` : levelName;

  let message = `${entry.timestamp.toISOString()} ${level} [${entry.component}] ${entry.message}`;

  if (entry.data && Object.keys(entry.data).length > 0) {
    message += ` ${JSON.stringify(entry.data)}`;
  }

  if (entry.error) {
    message += `\n${entry.error.stack || entry.error.message}`;
  }

  return message;
}

/**
 * Console transport for logging to stdout/stderr
 */
export class ConsoleTransport implements LogTransport {
  public readonly name = 'console';
  private readonly config: Required<ConsoleTransportConfig>;

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
      default:
        // eslint-disable-next-line no-console
        console.error(output);
    }
  }
}
