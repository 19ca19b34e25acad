/**
 * Console-backed structured logger.
 *
 * Lines are either pretty (`[timestamp] WARN: message {"key":"value"}`) or one
 * JSON object per line carrying timestamp, level, service and metadata.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogThreshold = LogLevel | "silent";
export type LogFormat = "pretty" | "json";

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerConfig {
  readonly service: string;
  readonly level: LogThreshold;
  readonly format: LogFormat;
}

const LEVELS: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export class Logger {
  constructor(private readonly config: LoggerConfig) {}

  get service(): string {
    return this.config.service;
  }

  child(module: string): Logger {
    return new Logger({ ...this.config, service: `${this.config.service}:${module}` });
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  private formatMessage(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const hasMeta = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.config.format === "pretty") {
      const metaStr = hasMeta ? ` ${JSON.stringify(metadata)}` : "";
      return `[${timestamp}] ${level.toUpperCase()}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.config.service,
      message,
      ...(hasMeta ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog("debug")) return;
    console.debug(this.formatMessage("debug", message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog("info")) return;
    console.info(this.formatMessage("info", message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog("warn")) return;
    console.warn(this.formatMessage("warn", message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog("error")) return;
    console.error(this.formatMessage("error", message, metadata));
  }
}

export function createLogger(service: string, level: LogThreshold = "info", format: LogFormat = "pretty"): Logger {
  return new Logger({ service, level, format });
}
