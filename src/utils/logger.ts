import { config } from '../config';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export class Logger {
  private threshold: number;

  constructor(level: string) {
    this.threshold = LEVEL_ORDER[isLogLevel(level) ? level : 'info'];
  }

  private formatTimestamp(): string {
    return new Date().toISOString();
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LEVEL_ORDER[level] < this.threshold) {
      return;
    }

    const timestamp = this.formatTimestamp();
    const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`;

    if (data !== undefined) {
      console[level === 'error' ? 'error' : 'log'](logMessage, data);
    } else {
      console[level === 'error' ? 'error' : 'log'](logMessage);
    }
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, error?: unknown): void {
    this.log('error', message, error);
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }
}

export const logger = new Logger(config.logging.level);
