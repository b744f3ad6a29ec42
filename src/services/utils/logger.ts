import { getEnvVariable } from './env';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export type LogLevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogEntry {
  timestamp: string;
  level: LogLevelName;
  message: string;
  data?: unknown;
}

/**
 * Resolve a level name such as "warn" or "NONE" to a LogLevel.
 * Unknown names fall back to INFO.
 */
export function parseLogLevel(name: string | undefined): LogLevel {
  switch ((name || '').trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'NONE':
    case 'SILENT':
      return LogLevel.NONE;
    default:
      return LogLevel.INFO;
  }
}

export class Logger {
  private level: LogLevel = parseLogLevel(getEnvVariable('TMX_ALIGNER_LOG_LEVEL'));
  private logs: LogEntry[] = [];
  private listeners: ((log: LogEntry) => void)[] = [];

  /** Keeps the most recent `maxLogs` entries for the log panel. */
  constructor(private readonly maxLogs = 1000) {}

  setLevel(level: LogLevel) {
    this.level = level;
  }

  subscribe(listener: (log: LogEntry) => void) {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  getLogs(): LogEntry[] {
    return this.logs.slice();
  }

  clear() {
    this.logs = [];
  }

  private addLog(level: LogLevelName, message: string, data?: unknown) {
    const timestamp = new Date().toISOString();

    const entry: LogEntry = { timestamp, level, message, data };

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    this.listeners.forEach((l) => l(entry));

    const consoleMsg = this.formatMessage(level, message, data);
    if (level === 'DEBUG') console.debug(consoleMsg);
    else if (level === 'INFO') console.info(consoleMsg);
    else if (level === 'WARN') console.warn(consoleMsg);
    else if (level === 'ERROR') console.error(consoleMsg);
  }

  private formatMessage(level: string, message: string, data?: unknown) {
    const now = new Date();
    // Local time as YYYY-MM-DD HH:MM:SS with UTC offset
    const year = now.getFullYear();
    const month = String(now.getMonth() + 1).padStart(2, '0');
    const day = String(now.getDate()).padStart(2, '0');
    const hours = String(now.getHours()).padStart(2, '0');
    const minutes = String(now.getMinutes()).padStart(2, '0');
    const seconds = String(now.getSeconds()).padStart(2, '0');
    const timezoneOffset = -now.getTimezoneOffset();
    const offsetHours = Math.floor(Math.abs(timezoneOffset) / 60);
    const offsetMinutes = Math.abs(timezoneOffset) % 60;
    const offsetSign = timezoneOffset >= 0 ? '+' : '-';
    const offsetMinutesStr = offsetMinutes > 0 ? `:${String(offsetMinutes).padStart(2, '0')}` : '';
    const timestamp = `${year}-${month}-${day} ${hours}:${minutes}:${seconds} UTC${offsetSign}${offsetHours}${offsetMinutesStr}`;

    let dataString = '';
    if (data !== undefined) {
      try {
        dataString = `\nData: ${JSON.stringify(data instanceof Error ? describeError(data) : data, null, 2)}`;
      } catch {
        dataString = `\nData: [Circular or Non-Serializable Object]`;
      }
    }
    return `[${timestamp}] [${level}] ${message}${dataString}`;
  }

  debug(message: string, data?: unknown) {
    if (this.level <= LogLevel.DEBUG) {
      this.addLog('DEBUG', message, data);
    }
  }

  info(message: string, data?: unknown) {
    if (this.level <= LogLevel.INFO) {
      this.addLog('INFO', message, data);
    }
  }

  warn(message: string, data?: unknown) {
    if (this.level <= LogLevel.WARN) {
      this.addLog('WARN', message, data);
    }
  }

  error(message: string, data?: unknown) {
    if (this.level <= LogLevel.ERROR) {
      this.addLog('ERROR', message, data);
    }
  }
}

// Error properties are non-enumerable, so JSON.stringify would print {}
function describeError(error: Error) {
  const { name: _name, message: _message, ...rest } = error;
  return { name: error.name, message: error.message, ...rest };
}

export const logger = new Logger();
