import { config } from '../config/environment';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMetadata = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  metadata?: LogMetadata;
}

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: line => console.debug(line),
  info: line => console.info(line),
  warn: line => console.warn(line),
  error: line => console.error(line)
};

/**
 * Structured logger scoped to one component. Each entry is written as a single
 * JSON line through the console method matching its level.
 */
export class Logger {
  constructor(
    private readonly component: string,
    private level: LogLevel = config.logging.level
  ) {}

  public debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  public info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  public warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  public error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }

  public child(component: string): Logger {
    return new Logger(`${this.component}:${component}`, this.level);
  }

  public setLogLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLogLevel(): LogLevel {
    return this.level;
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (SEVERITY[level] < SEVERITY[this.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      metadata
    };
    WRITERS[level](JSON.stringify(entry));
  }
}
