import { nowIso } from './date.js';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

interface LogEntry {
  level: LogLevel;
  service: string;
  message: string;
  timestamp: string;
  data?: unknown;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * LOG_LEVEL 파싱 (대소문자 무시, 비어있으면 INFO)
 */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toUpperCase();
  if (!normalized) return 'INFO';
  if (isLogLevel(normalized)) return normalized;
  throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join('|')}, got: ${raw}`);
}

/**
 * 루프/클라이언트에 주입하는 로거 형태
 */
export type LoggerLike = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export class Logger {
  constructor(
    private serviceName: string,
    private minLevel: LogLevel = 'INFO',
  ) {}

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (!this.enabled(level)) return;

    const entry: LogEntry = {
      level,
      service: this.serviceName,
      message,
      timestamp: nowIso(),
      data,
    };

    const formatted = JSON.stringify(entry);

    switch (level) {
      case 'DEBUG':
      case 'INFO':
        console.log(formatted);
        break;
      case 'WARN':
        console.warn(formatted);
        break;
      case 'ERROR':
        console.error(formatted);
        break;
    }
  }

  debug(message: string, data?: unknown) {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: unknown) {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: unknown) {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown) {
    const errorData =
      error instanceof Error ? { name: error.name, message: error.message, stack: error.stack } : error;
    this.log('ERROR', message, errorData);
  }

  child(suffix: string): Logger {
    return new Logger(`${this.serviceName}:${suffix}`, this.minLevel);
  }
}

export function createLogger(serviceName: string, minLevel?: LogLevel): Logger {
  return new Logger(serviceName, minLevel);
}
