import { config } from '@config/index';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
}

export type LogThreshold = `${LogLevel}` | 'silent';

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: Number.POSITIVE_INFINITY,
};

/** Known context fields extracted to structured log entry fields */
const KNOWN_CONTEXT_FIELDS = [
  'requestId', 'traceId', 'spanId', 'userId',
  'operation', 'duration', 'method', 'path', 'statusCode',
] as const;

export interface LogContext {
  requestId?: string;
  traceId?: string;
  spanId?: string;
  userId?: string;
  operation?: string;
  duration?: number;
  method?: string;
  path?: string;
  statusCode?: number;
  [key: string]: unknown;
}

export interface ExceptionInfo {
  type: string;
  message: string;
  stackTrace?: string;
}

export interface LogEntry {
  timestamp: string;
  correlationId?: string;
  serviceId: string;
  level: LogLevel;
  message: string;
  traceId?: string;
  spanId?: string;
  userId?: string;
  requestId?: string;
  method?: string;
  path?: string;
  statusCode?: number;
  durationMs?: number;
  metadata?: Record<string, string>;
  exception?: ExceptionInfo;
}

export interface LoggingClient {
  log(level: LogLevel, message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
  fatal(message: string, error?: Error, context?: LogContext): void;
  child(context: LogContext): LoggingClient;
  isEnabled(level: LogLevel): boolean;
}

export class PlatformLoggingClient implements LoggingClient {
  private static readonly SERVICE_ID = 'image-pipeline-service';
  private readonly version: string;

  constructor(
    private readonly threshold: LogThreshold = 'info',
    private readonly baseContext: LogContext = {},
    private readonly sink: (level: LogLevel, line: string) => void = writeToConsole
  ) {
    this.version = process.env.npm_package_version ?? '1.0.0';
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.threshold];
  }

  log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) return;
    this.send(this.buildEntry(level, message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.logWithException(LogLevel.ERROR, message, error, context);
  }

  fatal(message: string, error?: Error, context?: LogContext): void {
    this.logWithException(LogLevel.FATAL, message, error, context);
  }

  child(context: LogContext): LoggingClient {
    return new PlatformLoggingClient(this.threshold, { ...this.baseContext, ...context }, this.sink);
  }

  private logWithException(level: LogLevel, message: string, error?: Error, context?: LogContext): void {
    if (!this.isEnabled(level)) return;
    const entry = this.buildEntry(level, message, context);
    if (error) {
      entry.exception = {
        type: error.name,
        message: error.message,
        stackTrace: error.stack,
      };
    }
    this.send(entry);
  }

  private buildEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    const merged = { ...this.baseContext, ...context };
    const metadata = this.extractMetadata(merged);

    return {
      timestamp: new Date().toISOString(),
      correlationId: merged.requestId,
      serviceId: PlatformLoggingClient.SERVICE_ID,
      level,
      message,
      traceId: merged.traceId,
      spanId: merged.spanId,
      userId: merged.userId,
      requestId: merged.requestId,
      method: merged.method,
      path: merged.path,
      statusCode: merged.statusCode,
      durationMs: merged.duration,
      metadata: Object.keys(metadata).length > 0 ? metadata : undefined,
    };
  }

  private extractMetadata(context: LogContext): Record<string, string> {
    const metadata: Record<string, string> = {};
    const knownFields = new Set<string>(KNOWN_CONTEXT_FIELDS);

    for (const [key, value] of Object.entries(context)) {
      if (knownFields.has(key) || value == null) continue;
      metadata[key] = typeof value === 'object' ? JSON.stringify(value) : String(value);
    }
    return metadata;
  }

  private send(entry: LogEntry): void {
    const output = {
      ...entry,
      service: PlatformLoggingClient.SERVICE_ID,
      version: this.version,
      environment: process.env.NODE_ENV ?? 'development',
    };
    this.sink(entry.level, JSON.stringify(output));
  }
}

function writeToConsole(level: LogLevel, line: string): void {
  const consoleFnMap: Record<LogLevel, (msg: string) => void> = {
    [LogLevel.DEBUG]: console.debug,
    [LogLevel.INFO]: console.info,
    [LogLevel.WARN]: console.warn,
    [LogLevel.ERROR]: console.error,
    [LogLevel.FATAL]: console.error,
  };
  consoleFnMap[level](line);
}

// Singleton instance
export const logger: LoggingClient = new PlatformLoggingClient(config.logging.level);
